import mailparser from "mailparser";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { InboundMail } from "./types.js";
import { createInboxMonitor, toInboundMail } from "./inbox.js";

const imap = vi.hoisted(() => ({
  unseen: [] as number[],
  sources: new Map<number, Buffer>(),
  flagged: [] as string[],
  released: 0,
  loggedOut: 0,
}));

vi.mock("imapflow", () => ({
  ImapFlow: class {
    async connect() {}
    async getMailboxLock() {
      return {
        release: () => {
          imap.released += 1;
        },
      };
    }
    async search() {
      return imap.unseen;
    }
    async fetchOne(uid: string) {
      return { source: imap.sources.get(Number(uid)) };
    }
    async messageFlagsAdd(uid: string) {
      imap.flagged.push(uid);
      return true;
    }
    async logout() {
      imap.loggedOut += 1;
    }
  },
}));

const REPLY = [
  "From: Alice <alice@example.com>",
  "To: bot@example.com",
  "Subject: Re: Hello",
  "Message-ID: <reply-1@example.com>",
  "In-Reply-To: <AB100.0badf00d@meshtastic.local>",
  "References: <AB100.0badf00d@meshtastic.local> <AB200.11111111@meshtastic.local>",
  "X-Meshtastic-Email-ID: AB100",
  "",
  "Thanks!",
  "",
].join("\r\n");

const NO_SENDER = ["To: bot@example.com", "Subject: ???", "", "orphan", ""].join("\r\n");

const settings = {
  address: "bot@example.com",
  password: "test-secret",
  smtpHost: "smtp.example.com",
  smtpPort: 465,
  imapHost: "imap.example.com",
  imapPort: 993,
  pollMs: 30_000,
};

describe("toInboundMail", () => {
  it("maps threading headers and the bot header", async () => {
    const mail = toInboundMail(await mailparser.simpleParser(REPLY));
    expect(mail).toMatchObject({
      fromAddress: "alice@example.com",
      subject: "Re: Hello",
      messageId: "<reply-1@example.com>",
      inReplyTo: "<AB100.0badf00d@meshtastic.local>",
      references: ["<AB100.0badf00d@meshtastic.local>", "<AB200.11111111@meshtastic.local>"],
      headerEmailId: "AB100",
    });
    expect(mail?.text.trim()).toBe("Thanks!");
  });

  it("skips messages without a sender address", async () => {
    expect(toInboundMail(await mailparser.simpleParser(NO_SENDER))).toBeNull();
  });
});

describe("createInboxMonitor.checkOnce", () => {
  beforeEach(() => {
    imap.unseen = [1, 2];
    imap.sources = new Map([
      [1, Buffer.from(REPLY)],
      [2, Buffer.from(NO_SENDER)],
    ]);
    imap.flagged = [];
    imap.released = 0;
    imap.loggedOut = 0;
  });

  it("ingests unseen mail and flags everything it read", async () => {
    const ingest = vi.fn(async (_mail: InboundMail) => undefined);
    const monitor = createInboxMonitor({ settings, ingest });
    expect(await monitor.checkOnce()).toBe(1);
    expect(ingest).toHaveBeenCalledTimes(1);
    expect(ingest.mock.calls[0]?.[0]).toMatchObject({ fromAddress: "alice@example.com" });
    expect(imap.flagged).toEqual(["1", "2"]);
    expect(imap.released).toBe(1);
    expect(imap.loggedOut).toBe(1);
  });

  it("flags a message even when ingesting it fails", async () => {
    imap.unseen = [1];
    const ingest = vi.fn(async () => {
      throw new Error("store offline");
    });
    const monitor = createInboxMonitor({ settings, ingest });
    expect(await monitor.checkOnce()).toBe(0);
    expect(imap.flagged).toEqual(["1"]);
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MailTransport, OutgoingMail } from "./smtp.js";
import { createEmailService, formatFooter } from "./service.js";
import { EmailStore } from "./store.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "meshrelay-email-service-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function setup(sendMail: MailTransport["sendMail"] = async () => undefined) {
  const ids = ["AB100", "AB200", "AB300"];
  let draw = 0;
  const store = new EmailStore(path.join(dir, "emails.json"), { now: () => 1_700_000_000_000 });
  vi.spyOn(store, "generateId").mockImplementation(() => ids[draw++] ?? "ZZ999");
  const transport = { sendMail: vi.fn(sendMail), close: vi.fn() };
  const service = createEmailService({
    store,
    transport,
    botAddress: "Bot@Example.com",
    now: () => 1_700_000_000_000,
    randomHex: () => "0badf00d",
  });
  const mail = (index: number): OutgoingMail | undefined => transport.sendMail.mock.calls[index]?.[0];
  return { store, transport, service, mail };
}

describe("createEmailService.sendEmail", () => {
  it("sends with tracking headers and footer and stores the record", async () => {
    const { service, store, mail } = setup();
    const id = await service.sendEmail({
      senderNodeId: 42,
      recipientEmail: "alice@example.com",
      subject: "Hello",
      body: "  See you at the trailhead.  ",
    });

    expect(id).toBe("AB100");
    expect(mail(0)).toEqual({
      from: "Bot@Example.com",
      to: "alice@example.com",
      subject: "Hello",
      text: `  See you at the trailhead.  ${formatFooter(42)}`,
      messageId: "<AB100.0badf00d@meshtastic.local>",
      headers: { "X-Meshtastic-Sender-ID": "42", "X-Meshtastic-Email-ID": "AB100" },
      inReplyTo: undefined,
      references: undefined,
    });
    expect(store.get("AB100")).toEqual({
      id: "AB100",
      senderNodeId: 42,
      senderEmail: "user_42@meshtastic.local",
      recipientEmail: "alice@example.com",
      subject: "Hello",
      body: "See you at the trailhead.",
      timestamp: 1_700_000_000_000,
      direction: "outgoing",
      replyToId: undefined,
      messageId: "<AB100.0badf00d@meshtastic.local>",
    });
  });

  it("threads replies against the root email", async () => {
    const { service, store, mail } = setup();
    await service.sendEmail({
      senderNodeId: 42,
      recipientEmail: "alice@example.com",
      subject: "Hello",
      body: "first",
    });
    const reply = await service.ingestInbound({
      fromAddress: "alice@example.com",
      subject: "Re: Hello",
      text: "answer",
      references: [],
      headerEmailId: "AB100",
    });
    expect(reply?.replyToId).toBe("AB100");

    await service.sendEmail({
      senderNodeId: 42,
      recipientEmail: "alice@example.com",
      subject: "Re: Hello",
      body: "second",
      replyToId: "AB200",
    });
    expect(mail(1)?.inReplyTo).toBe("<AB100.0badf00d@meshtastic.local>");
    expect(mail(1)?.references).toBe("<AB100.0badf00d@meshtastic.local>");
    expect(store.get("AB300")?.replyToId).toBe("AB200");
  });

  it("stores nothing when SMTP fails", async () => {
    const { service, store } = setup(async () => {
      throw new Error("535 authentication failed");
    });
    await expect(
      service.sendEmail({ senderNodeId: 1, recipientEmail: "a@example.com", subject: "s", body: "b" }),
    ).rejects.toThrow("535 authentication failed");
    expect(store.size).toBe(0);
  });
});

describe("createEmailService.ingestInbound", () => {
  it("ignores our own mail and automated senders", async () => {
    const { service, store } = setup();
    const base = { subject: "x", text: "y", references: [] };
    expect(await service.ingestInbound({ ...base, fromAddress: "bot@example.com" })).toBeNull();
    expect(await service.ingestInbound({ ...base, fromAddress: "MAILER-DAEMON@example.com" })).toBeNull();
    expect(await service.ingestInbound({ ...base, fromAddress: "no-reply@example.com" })).toBeNull();
    expect(store.size).toBe(0);
  });

  it("keeps unmatched mail unlinked so it is invalidated later", async () => {
    const { service } = setup();
    const saved = await service.ingestInbound({
      fromAddress: "Carol <carol@example.com>",
      subject: "Random",
      text: "hello",
      references: [],
    });
    expect(saved?.senderEmail).toBe("carol@example.com");
    expect(saved?.recipientEmail).toBe("bot@example.com");
    expect(saved?.replyToId).toBeUndefined();
    expect(await service.getPendingReplies()).toEqual([]);
    expect((await service.getEmail("AB100"))?.senderNodeId).toBe(-1);
  });
});

import { formatErrorMessage } from "../infra/errors.js";
import { createSerialFileWriter, readJsonFile } from "../infra/json-file.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("sessions/known-senders");

/**
 * Append-only set of node numbers that ever sent a DM. Bookkeeping only:
 * persistence failures are logged and never reach the caller.
 */
export class KnownSenders {
  private readonly ids = new Set<number>();
  private readonly writer: ReturnType<typeof createSerialFileWriter>;

  constructor(private readonly filePath: string) {
    this.writer = createSerialFileWriter(filePath);
  }

  load(): number {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      log.warn("failed to read known senders; starting empty", {
        path: this.filePath,
        error: formatErrorMessage(err),
      });
      return 0;
    }
    if (Array.isArray(raw)) {
      for (const entry of raw) {
        if (typeof entry === "number" && Number.isInteger(entry) && entry > 0) {
          this.ids.add(entry);
        }
      }
    }
    log.info(`loaded ${this.ids.size} known sender(s)`);
    return this.ids.size;
  }

  has(nodeId: number): boolean {
    return this.ids.has(nodeId);
  }

  get size(): number {
    return this.ids.size;
  }

  list(): number[] {
    return [...this.ids].sort((a, b) => a - b);
  }

  /** Returns true for a first sighting; the write happens in the background. */
  mark(nodeId: number): boolean {
    if (this.ids.has(nodeId)) {
      return false;
    }
    this.ids.add(nodeId);
    this.writer.write(() => this.list()).catch((err: unknown) => {
      log.warn("failed to persist known senders", {
        path: this.filePath,
        error: formatErrorMessage(err),
      });
    });
    return true;
  }

  flush(): Promise<void> {
    return this.writer.flush();
  }
}

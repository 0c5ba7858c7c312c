import type { CallLogEntry } from "@shared/schema";

export interface IStorage {
  // Gateway call logs (metadata only, no prompt or response text)
  insertCallLog(entry: CallLogEntry): Promise<CallLogEntry>;
  listCallLogs(opts: { limit?: number; offset?: number }): Promise<CallLogEntry[]>;
  countCallLogs(): Promise<number>;
}

export const CALL_LOG_CAPACITY = 500;

/**
 * Process-local storage. Entries live for the server session only; the oldest
 * are dropped once `capacity` is reached.
 */
export class MemStorage implements IStorage {
  private callLogs: CallLogEntry[];

  constructor(private readonly capacity = CALL_LOG_CAPACITY) {
    this.callLogs = [];
  }

  async insertCallLog(entry: CallLogEntry): Promise<CallLogEntry> {
    this.callLogs.push(entry);
    if (this.callLogs.length > this.capacity) {
      this.callLogs.splice(0, this.callLogs.length - this.capacity);
    }
    return entry;
  }

  async listCallLogs(opts: { limit?: number; offset?: number }): Promise<CallLogEntry[]> {
    const limit = opts.limit ?? 50;
    const offset = opts.offset ?? 0;
    // Newest first
    return this.callLogs.slice().reverse().slice(offset, offset + limit);
  }

  async countCallLogs(): Promise<number> {
    return this.callLogs.length;
  }
}

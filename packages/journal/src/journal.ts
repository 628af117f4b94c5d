import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@goapbot/schemas";
import { validateJournalEventData } from "@goapbot/schemas";
import { redactPayload } from "./redact.js";

export interface JournalOptions {
  fsync?: boolean;
  redact?: boolean;
  /** Acquire an advisory lockfile so two processes never append to one journal. Default: true */
  lock?: boolean;
  /** Runs kept in the in-memory index before the least recently read is evicted. Default: 1000 */
  maxRunsIndexed?: number;
  /** "truncate" (default) drops a corrupt tail on init; "strict" throws. */
  recovery?: "truncate" | "strict";
  /**
   * Open for inspection only: no lockfile, init indexes up to the first break
   * and leaves the file as it is, and `emit` throws. Default: false
   */
  readOnly?: boolean;
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL log of agent runs. Each line carries the sha256 of the
 * previous line, so any edit or gap breaks the chain.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private runIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private maxRunsIndexed: number;
  private recovery: "truncate" | "strict";
  private readOnly: boolean;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.redact = options?.redact ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.maxRunsIndexed = options?.maxRunsIndexed ?? 1000;
    this.recovery = options?.recovery ?? "truncate";
    this.readOnly = options?.readOnly ?? false;
  }

  async init(): Promise<void> {
    if (!this.readOnly) {
      await mkdir(dirname(this.filePath), { recursive: true });
      if (this.lockEnabled) {
        await this.acquireLock();
      }
    }
    if (!existsSync(this.filePath)) return;

    const lines = (await readFile(this.filePath, "utf-8")).split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (!this.readOnly && last !== undefined && parseLine(last) === undefined) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      console.error("Journal: dropped incomplete last line");
    }

    const index = new Map<string, JournalEvent[]>();
    let prevHash: string | undefined;
    let maxSeq = -1;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === undefined || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at line ${i + 1}: hash chain broken`);
        }
        if (this.readOnly) {
          console.error(`Journal: chain broken at line ${i + 1}, ${lines.length - i} events not indexed`);
          break;
        }
        const tmpPath = `${this.filePath}.tmp`;
        const kept = lines.slice(0, i);
        await writeFile(tmpPath, kept.length > 0 ? kept.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        console.error(`Journal: chain broken at line ${i + 1}, truncated ${lines.length - i} events`);
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.runIndex = index;
    this.lastHash = prevHash;
    this.nextSeq = maxSeq + 1;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(runId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent> {
    if (this.readOnly) throw new Error(`Journal ${this.filePath} is open read-only`);
    let releaseLock: () => void = () => undefined;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const redacted = this.redact ? redactPayload(payload) : payload;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: runId,
        type,
        payload: isRecord(redacted) ? redacted : {},
        seq: this.nextSeq,
      };
      if (this.lastHash !== undefined) event.hash_prev = this.lastHash;

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance in-memory state after the write landed
      this.nextSeq += 1;
      this.lastHash = this.hash(line);
      this.index(event);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`Journal: listener threw on ${event.type}:`, err);
        }
      }
      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like `emit`, but a failed write is reported to stderr instead of thrown. */
  async tryEmit(runId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null> {
    try {
      return await this.emit(runId, type, payload);
    } catch (err) {
      console.error(`Journal: failed to record ${type}:`, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const events: JournalEvent[] = [];
    for (const line of (await readFile(this.filePath, "utf-8")).split("\n")) {
      const event = line ? parseLine(line) : undefined;
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readRun(runId: string, options?: { type?: JournalEventType }): JournalEvent[] {
    const events = this.runIndex.get(runId) ?? [];
    if (events.length > 0) this.touch(runId);
    return options?.type ? events.filter((e) => e.type === options.type) : [...events];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const lines = (await readFile(this.filePath, "utf-8")).split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === undefined || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Waits for pending writes and releases the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.locked) {
      await unlink(this.lockPath).catch(() => undefined);
      this.locked = false;
    }
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private index(event: JournalEvent): void {
    const bucket = this.runIndex.get(event.session_id);
    if (bucket) bucket.push(event);
    else this.runIndex.set(event.session_id, [event]);
    this.touch(event.session_id);
    while (this.runIndex.size > this.maxRunsIndexed) {
      const oldest = this.runIndex.keys().next().value;
      if (oldest === undefined) break;
      this.runIndex.delete(oldest);
    }
  }

  /** Map iteration order doubles as the LRU order. */
  private touch(runId: string): void {
    const events = this.runIndex.get(runId);
    if (!events) return;
    this.runIndex.delete(runId);
    this.runIndex.set(runId, events);
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
      return;
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
    }

    const owner = Number.parseInt((await readFile(this.lockPath, "utf-8").catch(() => "")).trim(), 10);
    if (Number.isInteger(owner) && processAlive(owner)) {
      throw new Error(`Journal is locked by process ${owner} (lockfile: ${this.lockPath})`);
    }
    await unlink(this.lockPath).catch(() => undefined);
    return this.acquireLock();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isJournalEvent(value: unknown): value is JournalEvent {
  return isRecord(value)
    && typeof value.event_id === "string"
    && typeof value.session_id === "string"
    && typeof value.type === "string"
    && isRecord(value.payload);
}

function parseLine(line: string): JournalEvent | undefined {
  try {
    const parsed: unknown = JSON.parse(line);
    return isJournalEvent(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return isErrnoException(err) && err.code === "EPERM";
  }
}

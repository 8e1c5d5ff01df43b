import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import {
  GENESIS_HASH,
  LedgerFormatError,
  canonicalJson,
  hashEntry,
  isJsonObject,
  parseEntryLine,
  serializeEntryLine,
  verifyEntries,
  type AnchorRecord,
  type AuditEntry,
  type JsonObject
} from "@incident/shared";

export interface AuditLedgerOptions {
  ledgerId: string;
  /** Directory holding `<ledgerId>.log` and `<ledgerId>.anchors.jsonl`; omit for a memory-only ledger. */
  directory?: string | null;
  clock?: () => Date;
}

async function readLines(file: string): Promise<string[]> {
  try {
    const text = await readFile(file, "utf8");
    return text.split("\n").filter((line) => line.length > 0);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
}

function parseAnchorLine(line: string, lineNumber: number): AnchorRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new LedgerFormatError(`Anchor line ${lineNumber} is not valid JSON.`, lineNumber);
  }
  if (!isJsonObject(parsed)) {
    throw new LedgerFormatError(`Anchor line ${lineNumber} is not an object.`, lineNumber);
  }
  const { case_id: ledgerId, latest_hash: latestHash, entry_count: entryCount, timestamp, anchor_data: anchorData } =
    parsed;
  if (
    typeof ledgerId !== "string" ||
    typeof latestHash !== "string" ||
    typeof entryCount !== "number" ||
    typeof timestamp !== "string" ||
    !isJsonObject(anchorData)
  ) {
    throw new LedgerFormatError(`Anchor line ${lineNumber} is missing anchor fields.`, lineNumber);
  }
  return { ledgerId, latestHash, entryCount, timestamp, anchorData };
}

function serializeAnchor(anchor: AnchorRecord): string {
  return canonicalJson({
    case_id: anchor.ledgerId,
    latest_hash: anchor.latestHash,
    entry_count: anchor.entryCount,
    timestamp: anchor.timestamp,
    anchor_data: anchor.anchorData
  });
}

/**
 * Append-only, hash-chained event log. All writes go through one promise chain, so the
 * chain has a single global order even with concurrent callers. The tail (last hash and
 * next index) stays resident; the log file is only ever appended to.
 */
export class AuditLedger {
  private readonly log: AuditEntry[] = [];
  private readonly anchorLog: AnchorRecord[] = [];
  private tip = GENESIS_HASH;
  private nextIndex = 0;
  private pending: Promise<void> = Promise.resolve();
  private readonly directory: string | null;
  private readonly clock: () => Date;

  private constructor(
    readonly ledgerId: string,
    options: AuditLedgerOptions
  ) {
    this.directory = options.directory ?? null;
    this.clock = options.clock ?? (() => new Date());
  }

  static async open(options: AuditLedgerOptions): Promise<AuditLedger> {
    const ledger = new AuditLedger(options.ledgerId, options);
    await ledger.restore();
    return ledger;
  }

  static inMemory(ledgerId: string, clock?: () => Date): AuditLedger {
    return new AuditLedger(ledgerId, { ledgerId, clock });
  }

  get logPath(): string | null {
    return this.directory ? path.join(this.directory, `${this.ledgerId}.log`) : null;
  }

  get anchorPath(): string | null {
    return this.directory ? path.join(this.directory, `${this.ledgerId}.anchors.jsonl`) : null;
  }

  get size(): number {
    return this.nextIndex;
  }

  append(actor: string, action: string, details: JsonObject = {}): Promise<AuditEntry> {
    return this.serialize(async () => {
      const fields = {
        index: this.nextIndex,
        timestamp: this.clock().toISOString(),
        actor,
        action,
        details: structuredClone(details),
        parentHash: this.tip
      };
      const entry: AuditEntry = { ...fields, hash: hashEntry(fields) };
      if (this.logPath) {
        await appendFile(this.logPath, `${serializeEntryLine(entry)}\n`, "utf8");
      }
      this.log.push(entry);
      this.tip = entry.hash;
      this.nextIndex += 1;
      return structuredClone(entry);
    });
  }

  latestHash(): string {
    return this.tip;
  }

  entries(limit?: number): AuditEntry[] {
    if (limit !== undefined && limit <= 0) return [];
    const selected = limit === undefined ? this.log : this.log.slice(-limit);
    return structuredClone(selected);
  }

  /**
   * Re-reads the persisted chain and recomputes every hash. The persisted tip must also
   * match the tip this handle wrote, which catches truncation of trailing entries.
   */
  verifyChain(): Promise<boolean> {
    return this.serialize(async () => {
      const logPath = this.logPath;
      if (!logPath) return verifyEntries(this.log);

      let persisted: AuditEntry[];
      try {
        persisted = (await readLines(logPath)).map((line, index) => parseEntryLine(line, index + 1));
      } catch (error) {
        if (error instanceof LedgerFormatError) return false;
        throw error;
      }
      const persistedTip = persisted.at(-1)?.hash ?? GENESIS_HASH;
      return persisted.length === this.nextIndex && persistedTip === this.tip && verifyEntries(persisted);
    });
  }

  anchor(anchorData: JsonObject = {}): Promise<AnchorRecord> {
    return this.serialize(async () => {
      const record: AnchorRecord = {
        ledgerId: this.ledgerId,
        latestHash: this.tip,
        entryCount: this.nextIndex,
        timestamp: this.clock().toISOString(),
        anchorData: structuredClone(anchorData)
      };
      if (this.anchorPath) {
        await appendFile(this.anchorPath, `${serializeAnchor(record)}\n`, "utf8");
      }
      this.anchorLog.push(record);
      return structuredClone(record);
    });
  }

  anchors(): AnchorRecord[] {
    return structuredClone(this.anchorLog);
  }

  private async restore(): Promise<void> {
    const logPath = this.logPath;
    const anchorPath = this.anchorPath;
    if (!this.directory || !logPath || !anchorPath) return;

    await mkdir(this.directory, { recursive: true });
    const entries = (await readLines(logPath)).map((line, index) => parseEntryLine(line, index + 1));
    this.log.push(...entries);
    const last = entries.at(-1);
    if (last) {
      this.tip = last.hash;
      this.nextIndex = last.index + 1;
    }
    const anchors = (await readLines(anchorPath)).map((line, index) => parseAnchorLine(line, index + 1));
    this.anchorLog.push(...anchors);
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const result = this.pending.then(work);
    // Failures reach the caller through `result`; later writes still queue behind this one.
    this.pending = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

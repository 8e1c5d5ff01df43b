import { createHash } from "node:crypto";
import { isJsonObject } from "./dag.js";
import type { AuditEntry, JsonValue } from "./types.js";

export const GENESIS_HASH = "0".repeat(64);

const HASH_PATTERN = /^[0-9a-f]{64}$/;

export class LedgerFormatError extends Error {
  constructor(
    message: string,
    readonly line: number
  ) {
    super(message);
    this.name = "LedgerFormatError";
  }
}

function escapeNonAscii(text: string): string {
  return text.replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`);
}

/**
 * Sorted keys, `,` and `:` separators, non-ASCII escaped as `\uXXXX`. This is the byte
 * layout existing ledgers were written with, so hashes stay comparable across writers.
 *
 * Numbers go through `JSON.stringify`, so an integer-valued float written by another
 * writer as `1.0` comes back as `1` and that entry no longer verifies.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return escapeNonAscii(JSON.stringify(value));
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((key) => `${escapeNonAscii(JSON.stringify(key))}:${canonicalJson(value[key])}`).join(",")}}`;
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

type EntryFields = Omit<AuditEntry, "hash">;

function toPersistedFields(entry: EntryFields): { [key: string]: JsonValue } {
  return {
    index: entry.index,
    timestamp: entry.timestamp,
    actor: entry.actor,
    action: entry.action,
    details: entry.details,
    parent_hash: entry.parentHash
  };
}

export function hashEntry(entry: EntryFields): string {
  return sha256Hex(canonicalJson(toPersistedFields(entry)));
}

export function serializeEntryLine(entry: AuditEntry): string {
  return `${canonicalJson(toPersistedFields(entry))} ${entry.hash}`;
}

export function parseEntryLine(line: string, lineNumber: number): AuditEntry {
  const separator = line.lastIndexOf(" ");
  if (separator <= 0) {
    throw new LedgerFormatError(`Ledger line ${lineNumber} has no hash suffix.`, lineNumber);
  }
  const hash = line.slice(separator + 1);
  if (!HASH_PATTERN.test(hash)) {
    throw new LedgerFormatError(`Ledger line ${lineNumber} has a malformed hash.`, lineNumber);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line.slice(0, separator));
  } catch {
    throw new LedgerFormatError(`Ledger line ${lineNumber} is not valid JSON.`, lineNumber);
  }
  if (!isJsonObject(parsed)) {
    throw new LedgerFormatError(`Ledger line ${lineNumber} is not an object.`, lineNumber);
  }

  const { index, timestamp, actor, action, details, parent_hash: parentHash } = parsed;
  if (
    typeof index !== "number" ||
    typeof timestamp !== "string" ||
    typeof actor !== "string" ||
    typeof action !== "string" ||
    !isJsonObject(details) ||
    typeof parentHash !== "string"
  ) {
    throw new LedgerFormatError(`Ledger line ${lineNumber} is missing entry fields.`, lineNumber);
  }

  return { index, timestamp, actor, action, details, parentHash, hash };
}

/**
 * Recomputes every hash from the recorded fields and checks the links between entries.
 * Usable on its own against an exported entry list; an empty list is a valid chain.
 */
export function verifyEntries(entries: readonly AuditEntry[]): boolean {
  let previous = GENESIS_HASH;
  for (const [position, entry] of entries.entries()) {
    if (entry.index !== position) return false;
    if (entry.parentHash !== previous) return false;
    if (hashEntry(entry) !== entry.hash) return false;
    previous = entry.hash;
  }
  return true;
}

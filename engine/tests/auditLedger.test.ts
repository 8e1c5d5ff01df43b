import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GENESIS_HASH, LedgerFormatError, hashEntry } from "@incident/shared";
import { AuditLedger } from "../src/ledger/auditLedger.js";

let directory = "";

beforeEach(async () => {
  directory = await mkdtemp(path.join(os.tmpdir(), "ledger-"));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

const fixedClock = () => new Date("2026-03-01T12:00:00.000Z");

describe("AuditLedger", () => {
  it("chains each entry to the previous hash", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory, clock: fixedClock });

    const first = await ledger.append("alice", "case_opened", { severity: "high" });
    const second = await ledger.append("bob", "task_approved", { task: "rotate" });

    expect(first.index).toBe(0);
    expect(first.parentHash).toBe(GENESIS_HASH);
    expect(first.hash).toBe(hashEntry(first));
    expect(second.parentHash).toBe(first.hash);
    expect(ledger.latestHash()).toBe(second.hash);
    expect(await ledger.verifyChain()).toBe(true);
  });

  it("writes one canonical line per entry", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory, clock: fixedClock });
    const entry = await ledger.append("alice", "note", { b: 1, a: "é" });

    const text = await readFile(path.join(directory, "case-7.log"), "utf8");

    expect(text).toBe(
      `{"action":"note","actor":"alice","details":{"a":"\\u00e9","b":1},"index":0,` +
        `"parent_hash":"${GENESIS_HASH}","timestamp":"2026-03-01T12:00:00.000Z"} ${entry.hash}\n`
    );
  });

  it("restores the tail when reopened", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });
    await ledger.append("alice", "one");
    const last = await ledger.append("alice", "two");

    const reopened = await AuditLedger.open({ ledgerId: "case-7", directory });
    const next = await reopened.append("carol", "three");

    expect(reopened.size).toBe(3);
    expect(next.index).toBe(2);
    expect(next.parentHash).toBe(last.hash);
    expect(await reopened.verifyChain()).toBe(true);
  });

  it("detects an edited entry", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });
    await ledger.append("alice", "task_approved", { task: "rotate" });
    await ledger.append("playbook-engine", "task_completed", { task: "rotate" });

    const file = path.join(directory, "case-7.log");
    const text = await readFile(file, "utf8");
    await writeFile(file, text.replace('"actor":"alice"', '"actor":"mallory"'), "utf8");

    expect(await ledger.verifyChain()).toBe(false);
  });

  it("detects truncated trailing entries", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });
    await ledger.append("alice", "one");
    await ledger.append("alice", "two");

    const file = path.join(directory, "case-7.log");
    const [firstLine] = (await readFile(file, "utf8")).split("\n");
    await writeFile(file, `${firstLine}\n`, "utf8");

    expect(await ledger.verifyChain()).toBe(false);
  });

  it("refuses to open a malformed log", async () => {
    await writeFile(path.join(directory, "case-7.log"), "not a ledger line\n", "utf8");

    await expect(AuditLedger.open({ ledgerId: "case-7", directory })).rejects.toBeInstanceOf(LedgerFormatError);
  });

  it("orders concurrent appends", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });

    const entries = await Promise.all(
      Array.from({ length: 20 }, (_, index) => ledger.append("worker", "tick", { n: index }))
    );

    expect(entries.map((entry) => entry.index)).toEqual(Array.from({ length: 20 }, (_, index) => index));
    expect(entries.map((entry) => entry.details.n)).toEqual(Array.from({ length: 20 }, (_, index) => index));
    expect(await ledger.verifyChain()).toBe(true);
  });

  it("returns the most recent entries for a limit", async () => {
    const ledger = AuditLedger.inMemory("case-7");
    await ledger.append("a", "one");
    await ledger.append("a", "two");
    await ledger.append("a", "three");

    expect(ledger.entries(2).map((entry) => entry.action)).toEqual(["two", "three"]);
    expect(ledger.entries(0)).toEqual([]);
    expect(ledger.entries()).toHaveLength(3);
  });

  it("hands out copies", async () => {
    const ledger = AuditLedger.inMemory("case-7");
    const details = { task: "rotate" };
    await ledger.append("alice", "note", details);
    details.task = "changed";

    const [entry] = ledger.entries();
    entry.details.task = "mutated";

    expect(ledger.entries()[0].details).toEqual({ task: "rotate" });
    expect(await ledger.verifyChain()).toBe(true);
  });

  it("persists anchors of the current tip", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory, clock: fixedClock });
    await ledger.append("alice", "one");
    const anchor = await ledger.anchor({ trigger: "manual" });

    expect(anchor).toEqual({
      ledgerId: "case-7",
      latestHash: ledger.latestHash(),
      entryCount: 1,
      timestamp: "2026-03-01T12:00:00.000Z",
      anchorData: { trigger: "manual" }
    });

    const reopened = await AuditLedger.open({ ledgerId: "case-7", directory });
    expect(reopened.anchors()).toEqual([anchor]);
  });

  it("reports the genesis tip while empty", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });

    expect(ledger.latestHash()).toBe(GENESIS_HASH);
    expect(ledger.size).toBe(0);
    expect(await ledger.verifyChain()).toBe(true);
    expect(AuditLedger.inMemory("case-8").latestHash()).toBe(GENESIS_HASH);
  });

  it("keeps the tip when reading, verifying and anchoring", async () => {
    const ledger = await AuditLedger.open({ ledgerId: "case-7", directory });
    const last = await ledger.append("alice", "one");
    const tip = ledger.latestHash();

    ledger.entries();
    ledger.entries(1);
    await ledger.verifyChain();
    await ledger.anchor({ trigger: "manual" });

    expect(tip).toBe(last.hash);
    expect(ledger.latestHash()).toBe(tip);
    expect(ledger.size).toBe(1);
  });
});

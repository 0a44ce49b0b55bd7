/**
 * Audit log golden tests
 *
 *   1. records chain within a day file
 *   2. tampering is detected by verifyAuditLog
 *   3. disabled logger writes nothing
 *   4. new UTC day → new file, new chain
 */

import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createHash } from "crypto";
import {
  AuditLogger,
  auditFileName,
  readAuditLog,
  stableStringify,
  verifyAuditLog,
} from "../index";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "greenfleet-audit-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

describe("stableStringify", () => {
  test("sorts keys recursively, keeps array order", () => {
    expect(stableStringify({ b: 1, a: { d: [3, 1], c: null } })).toBe('{"a":{"c":null,"d":[3,1]},"b":1}');
  });

  test("drops undefined members", () => {
    expect(stableStringify({ a: undefined, b: "x" })).toBe('{"b":"x"}');
  });
});

describe("auditFileName", () => {
  test("UTC date of the timestamp", () => {
    expect(auditFileName(new Date("2026-03-09T23:59:59Z"))).toBe("audit_20260309.jsonl");
  });
});

describe("AuditLogger", () => {
  test("first record has prev_hash null and a reproducible hash", () => {
    const log = new AuditLogger({ logDir: dir, now: fixedClock("2026-03-09T10:00:00.000Z") });
    const rec = log.logUserAction("open_dashboard");

    expect(rec).not.toBeNull();
    expect(rec!.index).toBe(1);
    expect(rec!.prev_hash).toBeNull();

    const body = '{"data":{"action":"open_dashboard","parameters":{}},"index":1,"severity":"INFO","timestamp":"2026-03-09T10:00:00.000Z","type":"user_action"}';
    expect(rec!.event_hash).toBe(createHash("sha256").update(body, "utf8").digest("hex"));
  });

  test("records chain and verify", () => {
    const log = new AuditLogger({ logDir: dir, now: fixedClock("2026-03-09T10:00:00.000Z") });
    const a = log.logSessionStart("s-1");
    const b = log.logFleetUpload("fleet.csv", 12, 10, ["Row 3: empty Device_Model, skipped"]);
    const c = log.logSessionEnd("s-1", 42);

    expect(b!.prev_hash).toBe(a!.event_hash);
    expect(c!.prev_hash).toBe(b!.event_hash);
    expect(b!.severity).toBe("WARNING");

    const path = log.currentFile();
    expect(readAuditLog(path).map(r => r.type)).toEqual(["session_start", "fleet_upload", "session_end"]);
    expect(verifyAuditLog(path)).toEqual({ valid: true, total_records: 3, last_event_hash: c!.event_hash });
  });

  test("event helpers shape their data", () => {
    const log = new AuditLogger({ logDir: dir, now: fixedClock("2026-03-09T10:00:00.000Z") });

    expect(log.logFleetAnalysis(50, 3.2, { KEEP: 20 }, { HIGH: 4, LOW: 46 })!.data.high_urgency_count).toBe(4);
    expect(log.logStrategyGenerated(500, "Baseline", 0, 0, 0, 999)!.data.achieves_target).toBe(false);
    expect(log.logExport("csv", 50, 2048)!.data.file_size_kb).toBe(2);
    expect(log.logError("calculation", "boom")!.severity).toBe("ERROR");
    expect(log.logValidationError("fleet_csv", ["a", "b"])!.data).toEqual({ type: "fleet_csv", error_count: 2, errors: ["a", "b"] });
    expect(log.logDeviceAnalysis("Tablet", 2, "Admin", "KEEP", "LOW", 0)!.type).toBe("device_analysis");
    expect(log.logCalculation("roi", { rows: 1 }, { net: -1484 })!.data).toEqual({ type: "roi", inputs: { rows: 1 }, outputs: { net: -1484 } });

    expect(verifyAuditLog(log.currentFile()).total_records).toBe(7);
  });

  test("upload errors are capped at 10", () => {
    const log = new AuditLogger({ logDir: dir });
    const errors = Array.from({ length: 15 }, (_, i) => `e${i}`);
    const rec = log.logFleetUpload("big.csv", 15, 0, errors);
    expect(rec!.data.error_count).toBe(15);
    expect(rec!.data.errors).toEqual(errors.slice(0, 10));
  });

  test("disabled logger writes nothing", () => {
    const sub = join(dir, "off");
    const log = new AuditLogger({ logDir: sub, enabled: false });
    expect(log.logSessionStart()).toBeNull();
    expect(existsSync(sub)).toBe(false);
  });

  test("each UTC day starts its own chain", () => {
    let now = "2026-03-09T23:59:00.000Z";
    const log = new AuditLogger({ logDir: dir, now: () => new Date(now) });
    log.logSessionStart();
    now = "2026-03-10T00:01:00.000Z";
    const next = log.logSessionStart();

    expect(next!.index).toBe(1);
    expect(next!.prev_hash).toBeNull();
    expect(readdirSync(dir).sort()).toEqual(["audit_20260309.jsonl", "audit_20260310.jsonl"]);
  });
});

describe("verifyAuditLog", () => {
  function writeThree(): string {
    const log = new AuditLogger({ logDir: dir, now: fixedClock("2026-03-09T10:00:00.000Z") });
    log.logUserAction("a");
    log.logUserAction("b");
    log.logUserAction("c");
    return log.currentFile();
  }

  test("missing file is valid and empty", () => {
    expect(verifyAuditLog(join(dir, "none.jsonl"))).toEqual({ valid: true, total_records: 0, last_event_hash: null });
  });

  test("edited data is detected", () => {
    const path = writeThree();
    const lines = readFileSync(path, "utf8").trim().split("\n");
    lines[1] = lines[1].replace('"action":"b"', '"action":"x"');
    writeFileSync(path, lines.join("\n") + "\n");

    const res = verifyAuditLog(path);
    expect(res.valid).toBe(false);
    expect(res.error_at_index).toBe(2);
    expect(res.error).toBe("event_hash mismatch at index 2");
  });

  test("deleted record is detected", () => {
    const path = writeThree();
    const lines = readFileSync(path, "utf8").trim().split("\n");
    writeFileSync(path, [lines[0], lines[2]].join("\n") + "\n");

    const res = verifyAuditLog(path);
    expect(res.valid).toBe(false);
    expect(res.error).toBe("index mismatch: expected 2, got 3");
  });

  test("garbage line is reported", () => {
    const path = writeThree();
    writeFileSync(path, readFileSync(path, "utf8") + "not json\n");
    expect(verifyAuditLog(path)).toEqual({
      valid: false,
      total_records: 4,
      last_event_hash: null,
      error: "Invalid JSON at line 4",
      error_at_index: undefined,
    });
  });
});

/**
 * Audit log verification
 *
 * Checks, per record:
 *   1. index is sequential (1, 2, 3, ...)
 *   2. prev_hash equals the previous record's event_hash (null for the first)
 *   3. event_hash matches the recomputed hash
 *
 * Any edit, reorder or deletion inside a file breaks one of these.
 */

import { existsSync, readFileSync } from "fs";
import { computeEventHash } from "./hash";
import { parseAuditLine } from "./logger";
import type { AuditRecord, AuditVerifyResult } from "./types";

function failure(total: number, error: string, at?: number): AuditVerifyResult {
  return { valid: false, total_records: total, last_event_hash: null, error, error_at_index: at };
}

export function verifyAuditLog(path: string): AuditVerifyResult {
  if (!existsSync(path)) return { valid: true, total_records: 0, last_event_hash: null };
  const content = readFileSync(path, "utf8").trim();
  if (!content) return { valid: true, total_records: 0, last_event_hash: null };

  const lines = content.split("\n").filter(Boolean);
  let records: AuditRecord[];
  try {
    records = lines.map((line, i) => parseAuditLine(line, i + 1));
  } catch (err) {
    return failure(lines.length, err instanceof Error ? err.message : String(err));
  }

  for (let i = 0; i < records.length; i++) {
    const r = records[i];
    const expectedPrev = i === 0 ? null : records[i - 1].event_hash;

    if (r.index !== i + 1) {
      return failure(records.length, `index mismatch: expected ${i + 1}, got ${r.index}`, i + 1);
    }
    if (r.prev_hash !== expectedPrev) {
      return failure(records.length, `prev_hash at index ${i + 1} does not match previous event_hash`, i + 1);
    }
    const { event_hash, ...unsealed } = r;
    if (event_hash !== computeEventHash(unsealed)) {
      return failure(records.length, `event_hash mismatch at index ${i + 1}`, i + 1);
    }
  }

  return {
    valid: true,
    total_records: records.length,
    last_event_hash: records[records.length - 1].event_hash,
  };
}

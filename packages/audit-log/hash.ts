/**
 * Stable serialization and hashing for the audit chain.
 */

import { createHash } from "crypto";
import type { AuditRecord } from "./types";

export function sha256(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Deterministic JSON: object keys sorted recursively, array order kept.
 * Undefined object members are dropped, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value) ?? "null";
  if (Array.isArray(value)) {
    return "[" + value.map(item => stableStringify(item)).join(",") + "]";
  }
  const pairs = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v));
  return "{" + pairs.join(",") + "}";
}

export function computeEventHash(record: Omit<AuditRecord, "event_hash">): string {
  const { index, timestamp, type, severity, data, prev_hash } = record;
  return sha256((prev_hash ?? "") + stableStringify({ index, timestamp, type, severity, data }));
}

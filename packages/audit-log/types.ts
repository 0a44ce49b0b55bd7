/**
 * Audit log types
 *
 * One JSONL file per UTC day. Each record is chained to the previous record
 * of the same file.
 */

export type AuditSeverity = "INFO" | "WARNING" | "ERROR";

export type AuditEventType =
  | "fleet_upload"
  | "fleet_analysis"
  | "strategy_generated"
  | "device_analysis"
  | "error"
  | "user_action"
  | "validation_error"
  | "calculation"
  | "export"
  | "session_start"
  | "session_end";

export type AuditData = Record<string, unknown>;

/**
 * Hash chain:
 *   event_hash = SHA-256((prev_hash ?? "") + stableStringify({ index, timestamp, type, severity, data }))
 *
 * First record of a file: prev_hash = null.
 */
export interface AuditRecord {
  /** 1-based, per file */
  index: number;
  /** ISO 8601 UTC */
  timestamp: string;
  type: AuditEventType;
  severity: AuditSeverity;
  data: AuditData;
  prev_hash: string | null;
  event_hash: string;
}

export interface AuditLoggerOptions {
  logDir: string;
  /** When false, nothing is written and append returns null */
  enabled?: boolean;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export interface AuditVerifyResult {
  valid: boolean;
  total_records: number;
  last_event_hash: string | null;
  error?: string;
  error_at_index?: number;
}

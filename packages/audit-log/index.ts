/**
 * Audit log — public API
 *
 * Append-only, hash-chained JSONL trail of what the application computed.
 */

export { AuditLogger, auditFileName, readAuditLog } from "./logger";
export { verifyAuditLog } from "./verify";
export { stableStringify } from "./hash";

export type {
  AuditData,
  AuditEventType,
  AuditLoggerOptions,
  AuditRecord,
  AuditSeverity,
  AuditVerifyResult,
} from "./types";

/**
 * audit-trail.ts — Process-wide audit logger
 *
 * Directory and on/off switch come from config (AUDIT_LOG_DIR,
 * AUDIT_LOG_ENABLED).
 */

import { AuditLogger } from "@greenfleet/audit-log";
import { getConfig } from "@/lib/config";

let _logger: AuditLogger | null = null;

export function getAuditLogger(): AuditLogger {
  if (!_logger) {
    const config = getConfig();
    _logger = new AuditLogger({ logDir: config.auditLogDir, enabled: config.auditLogEnabled });
  }
  return _logger;
}

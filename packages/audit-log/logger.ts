/**
 * Audit logger
 *
 * Append-only. Records go to {logDir}/audit_YYYYMMDD.jsonl for the UTC day
 * of their timestamp, each linked to the previous record of that file.
 *
 * Event helpers mirror what the application does: uploads, analyses,
 * strategies, exports, errors and session boundaries.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from "fs";
import { join } from "path";
import { computeEventHash } from "./hash";
import type {
  AuditData,
  AuditEventType,
  AuditLoggerOptions,
  AuditRecord,
  AuditSeverity,
} from "./types";

const SEVERITIES: readonly string[] = ["INFO", "WARNING", "ERROR"];

export function auditFileName(date: Date): string {
  const y = date.getUTCFullYear().toString();
  const m = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const d = date.getUTCDate().toString().padStart(2, "0");
  return `audit_${y}${m}${d}.jsonl`;
}

function isAuditRecord(value: unknown): value is AuditRecord {
  if (typeof value !== "object" || value === null) return false;
  const r: Partial<Record<keyof AuditRecord, unknown>> = value;
  return (
    typeof r.index === "number" &&
    typeof r.timestamp === "string" &&
    typeof r.type === "string" &&
    typeof r.severity === "string" && SEVERITIES.includes(r.severity) &&
    typeof r.data === "object" && r.data !== null &&
    (r.prev_hash === null || typeof r.prev_hash === "string") &&
    typeof r.event_hash === "string"
  );
}

/** Parse one JSONL line into a record; throws on malformed lines. */
export function parseAuditLine(line: string, lineNo: number): AuditRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new Error(`Invalid JSON at line ${lineNo}`);
  }
  if (!isAuditRecord(parsed)) {
    throw new Error(`Malformed audit record at line ${lineNo}`);
  }
  return parsed;
}

/** All records of one audit file. Missing or empty file → []. */
export function readAuditLog(path: string): AuditRecord[] {
  if (!existsSync(path)) return [];
  const content = readFileSync(path, "utf8").trim();
  if (!content) return [];
  return content.split("\n").filter(Boolean).map((line, i) => parseAuditLine(line, i + 1));
}

export class AuditLogger {
  readonly logDir: string;
  readonly enabled: boolean;
  private readonly now: () => Date;

  constructor(opts: AuditLoggerOptions) {
    this.logDir = opts.logDir;
    this.enabled = opts.enabled ?? true;
    this.now = opts.now ?? (() => new Date());
  }

  /** Path of the file that receives records written now. */
  currentFile(): string {
    return join(this.logDir, auditFileName(this.now()));
  }

  logEvent(type: AuditEventType, data: AuditData, severity: AuditSeverity = "INFO"): AuditRecord | null {
    if (!this.enabled) return null;

    const at = this.now();
    const path = join(this.logDir, auditFileName(at));
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });

    const existing = readAuditLog(path);
    const prev = existing.length > 0 ? existing[existing.length - 1] : null;

    const unsealed = {
      index: existing.length + 1,
      timestamp: at.toISOString(),
      type,
      severity,
      data,
      prev_hash: prev ? prev.event_hash : null,
    };
    const record: AuditRecord = { ...unsealed, event_hash: computeEventHash(unsealed) };

    appendFileSync(path, JSON.stringify(record) + "\n", "utf8");
    return record;
  }

  // ─── Event helpers ──────────────────────────────────────────────────────────

  logFleetUpload(filename: string, rowCount: number, validRows: number, errors: string[]): AuditRecord | null {
    return this.logEvent("fleet_upload", {
      filename,
      row_count: rowCount,
      valid_rows: validRows,
      error_count: errors.length,
      errors: errors.slice(0, 10),
    }, errors.length === 0 ? "INFO" : "WARNING");
  }

  logFleetAnalysis(
    fleetSize: number,
    avgAge: number,
    recommendations: Record<string, number>,
    urgencyBreakdown: Record<string, number>,
  ): AuditRecord | null {
    return this.logEvent("fleet_analysis", {
      fleet_size: fleetSize,
      avg_age: avgAge,
      recommendations,
      urgency_breakdown: urgencyBreakdown,
      high_urgency_count: urgencyBreakdown.HIGH ?? 0,
    });
  }

  logStrategyGenerated(
    fleetSize: number,
    strategy: string,
    co2ReductionPct: number,
    annualSavingsEur: number,
    roiYear1: number,
    monthsToTarget: number,
  ): AuditRecord | null {
    return this.logEvent("strategy_generated", {
      fleet_size: fleetSize,
      strategy,
      co2_reduction_pct: co2ReductionPct,
      annual_savings_eur: annualSavingsEur,
      roi_year1: roiYear1,
      months_to_target: monthsToTarget,
      achieves_target: monthsToTarget < 999,
    });
  }

  logDeviceAnalysis(
    device: string,
    ageYears: number,
    persona: string,
    recommendation: string,
    urgency: string,
    annualSavings: number,
  ): AuditRecord | null {
    return this.logEvent("device_analysis", {
      device,
      age_years: ageYears,
      persona,
      recommendation,
      urgency,
      annual_savings: annualSavings,
    });
  }

  logError(errorType: string, message: string, context: AuditData = {}): AuditRecord | null {
    return this.logEvent("error", { type: errorType, message, context }, "ERROR");
  }

  logUserAction(action: string, parameters: AuditData = {}): AuditRecord | null {
    return this.logEvent("user_action", { action, parameters });
  }

  logValidationError(validationType: string, errors: string[]): AuditRecord | null {
    return this.logEvent("validation_error", {
      type: validationType,
      error_count: errors.length,
      errors: errors.slice(0, 20),
    }, "WARNING");
  }

  logCalculation(calculationType: string, inputs: AuditData, outputs: AuditData): AuditRecord | null {
    return this.logEvent("calculation", { type: calculationType, inputs, outputs });
  }

  logExport(format: string, recordCount: number, fileSizeBytes: number): AuditRecord | null {
    return this.logEvent("export", {
      format,
      record_count: recordCount,
      file_size_kb: Math.round((fileSizeBytes / 1024) * 100) / 100,
    });
  }

  logSessionStart(sessionId?: string): AuditRecord | null {
    return this.logEvent("session_start", { session_id: sessionId ?? "anonymous" });
  }

  logSessionEnd(sessionId?: string, durationSeconds: number = 0): AuditRecord | null {
    return this.logEvent("session_end", {
      session_id: sessionId ?? "anonymous",
      duration_seconds: durationSeconds,
    });
  }
}

/**
 * route-errors.ts — Error → JSON response mapping for API routes
 *
 *   RequestValidationError → 400 { error }        + audit validation_error
 *   anything else          → 500 { error, detail } + console.error + audit error
 */

import { NextResponse } from "next/server";
import type { AuditLogger } from "@greenfleet/audit-log";
import { getAuditLogger } from "@/lib/audit-trail";
import { RequestValidationError } from "./request-validation";

/** Audit writes never turn a response into a failure; a failed write is logged. */
export function recordAudit(route: string, write: () => unknown): void {
  try {
    write();
  } catch (logErr) {
    console.error(`[${route}] audit log write failed:`, logErr);
  }
}

export function errorResponse(route: string, err: unknown, audit: AuditLogger = getAuditLogger()): NextResponse {
  if (err instanceof RequestValidationError) {
    recordAudit(route, () => audit.logValidationError(route, [err.message]));
    return NextResponse.json({ error: err.message }, { status: 400 });
  }

  const detail = err instanceof Error ? err.message : String(err);
  console.error(`[${route}] Error:`, err);
  recordAudit(route, () => audit.logError("route", detail, { route }));
  return NextResponse.json({ error: "Internal error", detail }, { status: 500 });
}

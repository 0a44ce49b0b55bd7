/**
 * fleet-input.ts — Fleet rows from an API body
 *
 * Shared by /api/audit/fleet and /api/audit/fleet/export: either "csv"
 * (text of a fleet inventory) or "demo" ({ size, seed }).
 */

import type { AuditLogger } from "@greenfleet/audit-log";
import { parseFleetCsv } from "@/lib/audit/fleet-parser";
import { generateDemoFleet } from "@/lib/audit/demo-fleet";
import type { FleetRow } from "@/lib/types/audit";
import {
  asObject,
  optionalNumber,
  optionalString,
  RequestValidationError,
  type JsonObject,
} from "./request-validation";
import { recordAudit } from "./route-errors";

export const MAX_CSV_CHARS = 5 * 1024 * 1024;
export const MAX_DEMO_SIZE = 5000;

export interface FleetInput {
  rows: FleetRow[];
  warnings: string[];
  source: "csv" | "demo";
}

export function readFleetInput(body: JsonObject, audit: AuditLogger, route: string): FleetInput {
  const csv = body.csv;

  if (typeof csv === "string") {
    if (csv.length > MAX_CSV_CHARS) {
      throw new RequestValidationError("CSV is too large (max 5 MB)");
    }
    const parsed = parseFleetCsv(csv);
    const filename = optionalString(body, "filename", "upload.csv");
    recordAudit(route, () => audit.logFleetUpload(filename, parsed.rowCount, parsed.rows.length, parsed.errors));
    if (parsed.errors.length > 0) {
      throw new RequestValidationError(parsed.errors.join("; "));
    }
    return { rows: parsed.rows, warnings: parsed.warnings, source: "csv" };
  }

  if (body.demo !== undefined) {
    const demo = asObject(body.demo);
    const size = optionalNumber(demo, "size", 50, { min: 1, max: MAX_DEMO_SIZE, integer: true });
    const seed = optionalNumber(demo, "seed", 42, { integer: true });
    return { rows: generateDemoFleet(size, seed), warnings: [], source: "demo" };
  }

  throw new RequestValidationError('Provide either "csv" or "demo"');
}

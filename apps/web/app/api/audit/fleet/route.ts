/**
 * POST /api/audit/fleet
 *
 * Fleet-wide audit from CSV text, or from the seeded demo fleet.
 *
 * Request body:
 * {
 *   "csv": "Device_Model;Age_Years;Persona;Country;Business_Unit\n...",   // or
 *   "demo": { "size": 50, "seed": 42 },
 *   "filename": "fleet.csv",
 *   "goal": "balanced",
 *   "grid_overrides": { "FR": 0.05 }     // kg CO2/kWh by country
 * }
 *
 * Response: { analyses, summary, warnings, source }
 */

import { NextRequest, NextResponse } from "next/server";
import { analyzeFleet, summarizeFleet } from "@/lib/audit/fleet-analyzer";
import { OPTIMIZATION_GOALS } from "@/lib/audit/recommendation-engine";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import { readFleetInput } from "@/lib/api/fleet-input";
import { optionalEnum, optionalNumberRecord, readJsonBody } from "@/lib/api/request-validation";

const ROUTE = "/api/audit/fleet";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const goal = optionalEnum(body, "goal", OPTIMIZATION_GOALS, "balanced");
    const gridOverrides = optionalNumberRecord(body, "grid_overrides");
    const audit = getAuditLogger();

    const { rows, warnings, source } = readFleetInput(body, audit, ROUTE);
    const analyses = analyzeFleet(rows, goal, undefined, gridOverrides);
    const summary = summarizeFleet(analyses);

    console.log(`[fleet] ${summary.totalDevices} devices analysed (${source}, ${goal})`);
    recordAudit(ROUTE, () => audit.logFleetAnalysis(
      summary.totalDevices,
      summary.averageAgeYears,
      summary.byRecommendation,
      summary.byUrgency,
    ));

    return NextResponse.json({ analyses, summary, warnings, source });
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

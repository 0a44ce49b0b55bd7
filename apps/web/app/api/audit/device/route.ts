/**
 * POST /api/audit/device
 *
 * Keep / new / refurbished recommendation for one device.
 *
 * Request body:
 * {
 *   "device": "Laptop (Standard)",
 *   "age_years": 4,
 *   "persona": "Admin High (Dev/Data)",
 *   "country": "FR",
 *   "goal": "balanced",          // balanced | cost_first | eco_first
 *   "live_data": false           // true → grid factor and manufacturing CO2 from the live APIs
 * }
 */

import { NextRequest, NextResponse } from "next/server";
import { analyzeDevice, OPTIMIZATION_GOALS } from "@/lib/audit/recommendation-engine";
import { resolveDeviceFootprint, resolveGridFactor } from "@/lib/grid/resolveGridFactor";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import {
  optionalBoolean,
  optionalEnum,
  optionalString,
  readJsonBody,
  requireNumber,
  requireString,
} from "@/lib/api/request-validation";

const ROUTE = "/api/audit/device";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);

    const deviceName = requireString(body, "device");
    const ageYears = requireNumber(body, "age_years", { min: 0, max: 30 });
    const persona = optionalString(body, "persona", "");
    const country = optionalString(body, "country", "FR").toUpperCase();
    const goal = optionalEnum(body, "goal", OPTIMIZATION_GOALS, "balanced");
    const liveData = optionalBoolean(body, "live_data", false);

    const [grid, manufacturing] = liveData
      ? await Promise.all([resolveGridFactor(country), resolveDeviceFootprint(deviceName)])
      : [null, null];

    const analysis = analyzeDevice({
      deviceName,
      ageYears,
      persona,
      country,
      goal,
      gridFactorOverride: grid?.source === "api" ? grid.value : undefined,
    });

    recordAudit(ROUTE, () => getAuditLogger().logDeviceAnalysis(
      analysis.deviceName,
      analysis.ageYears,
      analysis.persona,
      analysis.recommendation,
      analysis.urgency,
      analysis.annualSavings,
    ));

    return NextResponse.json({ analysis, grid_factor: grid, manufacturing_co2: manufacturing });
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

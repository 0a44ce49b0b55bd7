/**
 * POST /api/simulate
 *
 * Lifecycle optimizer: keep / new / refurbished for one asset and role,
 * weighted between financial cost and monetised CO2.
 *
 * Request body:
 * {
 *   "device": "High-End Laptop",
 *   "persona": "Developer",
 *   "age_years": 4,
 *   "financial_weight_pct": 50        // 0 = CO2 only, 100 = cost only
 * }
 */

import { NextRequest, NextResponse } from "next/server";
import { runSimulation } from "@/lib/simulate/lifecycle-engine";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import { optionalNumber, optionalString, readJsonBody, requireNumber } from "@/lib/api/request-validation";

const ROUTE = "/api/simulate";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);

    const result = runSimulation({
      device: optionalString(body, "device", ""),
      persona: optionalString(body, "persona", ""),
      ageYears: requireNumber(body, "age_years", { min: 0, max: 30 }),
      financialWeightPct: optionalNumber(body, "financial_weight_pct", 50),
    });

    recordAudit(ROUTE, () => getAuditLogger().logCalculation(
      "lifecycle_simulation",
      { device: result.device, persona: result.persona, age_years: result.ageYears, financial_weight_pct: result.financialWeightPct },
      { best: result.best },
    ));

    return NextResponse.json(result);
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

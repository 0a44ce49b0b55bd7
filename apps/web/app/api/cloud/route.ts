/**
 * POST /api/cloud
 *
 * Cloud storage archival strategy.
 *
 * Request body:
 * {
 *   "storage_gb": 50000,
 *   "providers": ["AWS"],
 *   "reduction_target_pct": 30,
 *   "data_growth_rate_pct": 10,
 *   "projection_years": 5,
 *   "target_emissions_kg": 2000         // optional: projection toward an absolute target
 * }
 */

import { NextRequest, NextResponse } from "next/server";
import {
  ARCHIVAL_CO2_REDUCTION,
  ARCHIVE_EUR_PER_GB_MONTH,
  calculateArchivalNeeded,
  calculateArchivalStrategy,
  calculateBaselineMetrics,
  calculateCarbonIntensity,
  calculateCumulativeSavings,
  getCloudProviders,
  offersFor,
  STANDARD_EUR_PER_GB_MONTH,
} from "@/lib/cloud/storage-engine";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import {
  optionalNumber,
  optionalStringArray,
  readJsonBody,
  requireNumber,
  RequestValidationError,
} from "@/lib/api/request-validation";

const ROUTE = "/api/cloud";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);

    const storageGb = requireNumber(body, "storage_gb", { min: 0 });
    const providers = optionalStringArray(body, "providers", []);
    const reductionTargetPct = optionalNumber(body, "reduction_target_pct", 30, { min: 0, max: 100 });
    const dataGrowthRatePct = optionalNumber(body, "data_growth_rate_pct", 10, { min: 0, max: 500 });
    const projectionYears = optionalNumber(body, "projection_years", 5, { min: 1, max: 30, integer: true });

    const known = getCloudProviders();
    const unknown = providers.filter(p => !known.includes(p));
    if (unknown.length > 0) {
      throw new RequestValidationError(`Unknown provider: ${unknown.join(", ")}. Valid: ${known.join(", ")}`);
    }

    const carbonIntensity = calculateCarbonIntensity(providers);
    const baseline = calculateBaselineMetrics(storageGb, carbonIntensity);
    const strategy = calculateArchivalStrategy({
      storageGb,
      reductionTargetPct,
      dataGrowthRatePct,
      carbonIntensity,
      projectionYears,
    });
    const savings = calculateCumulativeSavings(strategy);

    const target = body.target_emissions_kg;
    const targetProjection = target === undefined || target === null
      ? null
      : calculateArchivalNeeded({
          currentStorageGb: storageGb,
          targetEmissionsKg: requireNumber(body, "target_emissions_kg", { min: 0 }),
          carbonIntensity,
          yearsAhead: projectionYears,
          annualGrowthRate: dataGrowthRatePct / 100,
          archivalReduction: ARCHIVAL_CO2_REDUCTION,
          standardCostPerGbMonth: STANDARD_EUR_PER_GB_MONTH,
          archiveCostPerGbMonth: ARCHIVE_EUR_PER_GB_MONTH,
        });

    recordAudit(ROUTE, () => getAuditLogger().logCalculation(
      "cloud_archival",
      { storage_gb: storageGb, providers, reduction_target_pct: reductionTargetPct, projection_years: projectionYears },
      { co2_saved_kg: savings.co2SavedKg, eur_saved: savings.eurSaved },
    ));

    return NextResponse.json({
      carbonIntensity,
      offers: offersFor(providers),
      baseline,
      strategy,
      savings,
      targetProjection,
    });
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

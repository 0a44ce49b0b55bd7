/**
 * POST /api/strategies
 *
 * Transition strategy projections for a fleet.
 *
 * Request body:
 * {
 *   "fleet_size": 500,
 *   "strategy": "combined_optimization",   // optional; omitted → compare all
 *   "current_refresh_years": 4,
 *   "current_refurb_rate": 0,
 *   "target_reduction": 0.20,
 *   "time_horizon_months": 36,
 *   "growth": {                            // optional headcount growth projection
 *     "current_devices": 150,
 *     "growth_pct": 10,
 *     "years": 3,
 *     "procurement": "refurbished",        // new | refurbished
 *     "device": "Laptop (Standard)"
 *   }
 * }
 */

import { NextRequest, NextResponse } from "next/server";
import { compareStrategies, fleetAverages, simulateStrategy } from "@/lib/strategy/strategy-simulator";
import { PROCUREMENT_MODES, projectGrowth, type GrowthProjection } from "@/lib/strategy/growth-projection";
import { loadReferenceData } from "@/lib/registry/readReferenceData";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import {
  asObject,
  optionalEnum,
  optionalNumber,
  optionalString,
  readJsonBody,
  requireNumber,
  RequestValidationError,
} from "@/lib/api/request-validation";

const ROUTE = "/api/strategies";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const ref = loadReferenceData();

    const fleetSize = requireNumber(body, "fleet_size", { min: 0, integer: true });
    const currentRefreshYears = optionalNumber(body, "current_refresh_years", ref.rules.fleet.defaultRefreshYears, { min: 1, max: 10 });
    const currentRefurbRate = optionalNumber(body, "current_refurb_rate", 0, { min: 0, max: 1 });
    const targetReduction = optionalNumber(body, "target_reduction", ref.rules.fleet.defaultTargetReduction, { min: 0, max: 1 });
    const timeHorizonMonths = optionalNumber(body, "time_horizon_months", 36, { min: 1, max: 120, integer: true });
    const strategyKey = optionalString(body, "strategy", "");

    if (strategyKey && !(strategyKey in ref.strategies)) {
      throw new RequestValidationError(`Unknown strategy. Valid: ${Object.keys(ref.strategies).join(", ")}`);
    }

    const projections = strategyKey
      ? [simulateStrategy({
          strategyKey,
          fleetSize,
          currentRefreshYears,
          currentRefurbRate,
          targetReduction,
          timeHorizonMonths,
          ...fleetAverages(ref),
        }, ref)]
      : compareStrategies({ fleetSize, currentRefreshYears, currentRefurbRate, targetReduction, timeHorizonMonths }, ref);

    let growth: GrowthProjection | null = null;
    if (body.growth !== undefined && body.growth !== null) {
      const g = asObject(body.growth);
      growth = projectGrowth({
        currentDevices: requireNumber(g, "current_devices", { min: 0 }),
        annualGrowthPct: optionalNumber(g, "growth_pct", 10, { min: 0, max: 100 }),
        years: optionalNumber(g, "years", 3, { min: 1, max: 10, integer: true }),
        procurement: optionalEnum(g, "procurement", PROCUREMENT_MODES, "new"),
        deviceName: optionalString(g, "device", "") || undefined,
      }, ref);
    }

    const best = projections[0];
    recordAudit(ROUTE, () => getAuditLogger().logStrategyGenerated(
      fleetSize,
      best.strategyName,
      best.finalCo2ReductionPct,
      best.annualSavings,
      best.roiYear1,
      best.monthsToTarget,
    ));

    return NextResponse.json({ projections, recommended: best.strategyKey, growth });
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

/**
 * fleet-analyzer.ts — Run the device recommendation over a whole fleet
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import { roundTo, sum } from "@/lib/math";
import { analyzeDevice } from "./recommendation-engine";
import type { ReferenceData } from "@/lib/types/reference";
import type {
  BusinessUnitSummary,
  DeviceAnalysis,
  FleetRow,
  FleetSummary,
  OptimizationGoal,
} from "@/lib/types/audit";

export function analyzeFleet(
  rows: FleetRow[],
  goal: OptimizationGoal = "balanced",
  ref: ReferenceData = loadReferenceData(),
  gridFactorOverrides: Record<string, number> = {},
): DeviceAnalysis[] {
  const overrides = new Map<string, number>();
  for (const [country, factor] of Object.entries(gridFactorOverrides)) {
    overrides.set(country.trim().toUpperCase(), factor);
  }

  return rows.map(row => {
    const analysis = analyzeDevice(
      {
        deviceName: row.deviceModel,
        ageYears: row.ageYears,
        persona: row.persona,
        country: row.country,
        goal,
        gridFactorOverride: overrides.get(row.country.trim().toUpperCase()),
      },
      ref,
    );
    return { ...analysis, businessUnit: row.businessUnit };
  });
}

export function summarizeFleet(analyses: DeviceAnalysis[]): FleetSummary {
  const byRecommendation = { KEEP: 0, NEW: 0, REFURBISHED: 0 };
  const byUrgency = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  const byBusinessUnit: Record<string, BusinessUnitSummary> = {};

  for (const a of analyses) {
    byRecommendation[a.recommendation] += 1;
    byUrgency[a.urgency] += 1;

    const unit = a.businessUnit || "Unknown";
    const entry = byBusinessUnit[unit] ?? { count: 0, savings: 0, co2: 0, highUrgency: 0 };
    entry.count += 1;
    entry.savings = roundTo(entry.savings + a.annualSavings, 2);
    entry.co2 = roundTo(entry.co2 + a.co2Savings, 2);
    if (a.urgency === "HIGH") entry.highUrgency += 1;
    byBusinessUnit[unit] = entry;
  }

  const total = analyses.length;
  return {
    totalDevices: total,
    byRecommendation,
    byUrgency,
    totalAnnualSavingsEur: roundTo(sum(analyses.map(a => a.annualSavings)), 2),
    totalCo2SavingsKg: roundTo(sum(analyses.map(a => a.co2Savings)), 2),
    totalRecoverableValueEur: roundTo(sum(analyses.map(a => a.residualValue)), 2),
    averageAgeYears: total > 0 ? roundTo(sum(analyses.map(a => a.ageYears)) / total, 2) : 0,
    byBusinessUnit,
  };
}

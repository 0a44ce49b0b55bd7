/**
 * co2-engine.ts — Annual carbon footprint per scenario
 *
 *   CO2_annual = Manufacturing_CO2 / Lifespan_years + Usage_CO2
 *   Usage_CO2  = Power_kW × Hours_annual × Grid_factor
 *
 * Keeping a device carries no manufacturing share (already emitted).
 */

import { getGridFactor, loadReferenceData } from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import { annualHours } from "./tco-engine";
import type { ReferenceData } from "@/lib/types/reference";
import type { Co2Result } from "@/lib/types/audit";

export function calculateUsageCo2(
  deviceName: string,
  personaName: string,
  country: string,
  ref: ReferenceData = loadReferenceData(),
  gridFactorOverride?: number,
): number {
  const device = ref.devices[deviceName];
  if (!device || !ref.personas[personaName]) return 0;
  const grid = gridFactorOverride ?? getGridFactor(country, ref);
  return roundTo(device.powerKw * annualHours(personaName, ref) * grid, 2);
}

export function calculateCo2Keep(
  deviceName: string,
  personaName: string,
  country: string,
  ref: ReferenceData = loadReferenceData(),
  gridFactorOverride?: number,
): Co2Result {
  const usage = calculateUsageCo2(deviceName, personaName, country, ref, gridFactorOverride);
  return {
    total: roundTo(usage, 2),
    breakdown: { manufacturing: 0, usage: roundTo(usage, 2) },
    available: true,
  };
}

export function calculateCo2New(
  deviceName: string,
  personaName: string,
  country: string,
  ref: ReferenceData = loadReferenceData(),
  gridFactorOverride?: number,
): Co2Result {
  const device = ref.devices[deviceName];
  if (!device) return { total: 0, breakdown: {}, available: true };

  const manufacturing = device.co2ManufacturingKg / (device.lifespanMonths / 12);
  const usage = calculateUsageCo2(deviceName, personaName, country, ref, gridFactorOverride);

  return {
    total: roundTo(manufacturing + usage, 2),
    breakdown: { manufacturing: roundTo(manufacturing, 2), usage: roundTo(usage, 2) },
    available: true,
  };
}

/** Refurbished units carry 15% of the manufacturing footprint and a usage penalty. */
export function calculateCo2Refurb(
  deviceName: string,
  personaName: string,
  country: string,
  ref: ReferenceData = loadReferenceData(),
  gridFactorOverride?: number,
): Co2Result {
  const device = ref.devices[deviceName];
  if (!device) return { total: 0, breakdown: {}, available: false };
  if (!device.refurbAvailable) return { total: Infinity, breakdown: {}, available: false };

  const refurb = ref.rules.refurb;
  const manufacturing =
    (device.co2ManufacturingKg * (1 - refurb.co2ReductionFactor)) / refurb.warrantyYears;
  const usage =
    calculateUsageCo2(deviceName, personaName, country, ref, gridFactorOverride) * (1 + refurb.energyPenaltyFactor);

  return {
    total: roundTo(manufacturing + usage, 2),
    breakdown: { manufacturing: roundTo(manufacturing, 2), usage: roundTo(usage, 2) },
    available: true,
  };
}

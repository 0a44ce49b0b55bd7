/**
 * growth-projection.ts — Devices, CO2 and budget needed to equip headcount growth
 *
 *   Fleet[y]     = Fleet[0] × (1 + g)^y
 *   New devices  = Fleet[y] − Fleet[0]
 *   CO2          = New × Mfg_CO2 × impact      (refurbished: impact 0.6)
 *   Budget       = New × Price × cost          (refurbished: cost 0.7)
 */

import { getDevice, loadReferenceData, resolveDeviceName } from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import type { ReferenceData } from "@/lib/types/reference";

export const PROCUREMENT_MODES = ["new", "refurbished"] as const;
export type ProcurementMode = (typeof PROCUREMENT_MODES)[number];

export const REFURB_CO2_FACTOR = 0.6;
export const REFURB_COST_FACTOR = 0.7;

export interface GrowthParams {
  currentDevices: number;
  annualGrowthPct: number;
  years: number;
  procurement: ProcurementMode;
  /** Device bought for new hires; unknown names fall back like the audit */
  deviceName?: string;
}

export interface GrowthYear {
  year: number;
  fleetSize: number;
  newDevices: number;
  co2Kg: number;
  budgetEur: number;
}

export interface GrowthProjection {
  deviceName: string;
  procurement: ProcurementMode;
  /** Whole devices to buy by the last year */
  newDevicesNeeded: number;
  co2Kg: number;
  co2Tonnes: number;
  budgetEur: number;
  /** CO2 avoided against buying the same devices new */
  co2AvoidedKg: number;
  years: GrowthYear[];
}

export function projectGrowth(p: GrowthParams, ref: ReferenceData = loadReferenceData()): GrowthProjection {
  const deviceName = resolveDeviceName(p.deviceName, ref);
  const device = getDevice(deviceName, ref);
  const refurb = p.procurement === "refurbished";
  const impact = refurb ? REFURB_CO2_FACTOR : 1;
  const cost = refurb ? REFURB_COST_FACTOR : 1;
  const growth = 1 + p.annualGrowthPct / 100;

  const years: GrowthYear[] = [];
  let added = 0;
  for (let year = 1; year <= Math.floor(p.years); year++) {
    const fleet = p.currentDevices * growth ** year;
    added = fleet - p.currentDevices;
    years.push({
      year,
      fleetSize: roundTo(fleet, 2),
      newDevices: Math.floor(added),
      co2Kg: roundTo(added * device.co2ManufacturingKg * impact, 2),
      budgetEur: roundTo(added * device.priceNewEur * cost, 2),
    });
  }

  const co2 = added * device.co2ManufacturingKg * impact;
  return {
    deviceName,
    procurement: p.procurement,
    newDevicesNeeded: Math.floor(added),
    co2Kg: roundTo(co2, 2),
    co2Tonnes: roundTo(co2 / 1000, 2),
    budgetEur: roundTo(added * device.priceNewEur * cost, 2),
    co2AvoidedKg: roundTo(added * device.co2ManufacturingKg - co2, 2),
    years,
  };
}

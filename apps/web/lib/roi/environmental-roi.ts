/**
 * environmental-roi.ts — Carbon value of avoided manufacturing vs productivity lag
 *
 *   CO2_saved    = Mfg_CO2 × 0.8        (manufacturing avoided by extending life)
 *   Carbon_value = CO2_saved / 1000 × Carbon_price (€/t)
 *   Lag_cost     = Annual_salary × 0.03
 *   Net_ROI      = Carbon_value − Lag_cost
 */

import { roundTo, sum } from "@/lib/math";
import type { EnvironmentalRoiReport, RoiInventoryRow, RoiJoinedRow, RoiResult } from "@/lib/types/roi";

export const DEFAULT_CARBON_PRICE = 80;      // € / tonne
export const MANUFACTURING_CREDIT = 0.8;
export const LAG_COST_RATE = 0.03;

export function computeRoi(
  row: RoiInventoryRow,
  mfgCo2: number,
  carbonPrice = DEFAULT_CARBON_PRICE,
): RoiResult {
  const co2Saved = mfgCo2 * MANUFACTURING_CREDIT;
  const carbonValue = (co2Saved / 1000) * carbonPrice;
  const lagCost = row.annualSalary * LAG_COST_RATE;

  return {
    equipment: row.equipmentType,
    co2SavedKg: roundTo(co2Saved, 2),
    carbonValueEur: roundTo(carbonValue, 2),
    lagCostEur: roundTo(lagCost, 2),
    netRoiEur: roundTo(carbonValue - lagCost, 2),
  };
}

/**
 * Left join inventory rows on equipment type. Unmatched types keep their lag
 * cost, get null carbon values and are named once in `warnings`.
 */
export function computeEnvironmentalRoi(
  inventory: RoiInventoryRow[],
  carbonFactors: Record<string, number>,
  carbonPrice = DEFAULT_CARBON_PRICE,
): EnvironmentalRoiReport {
  const factors = new Map<string, number>();
  for (const [type, value] of Object.entries(carbonFactors)) factors.set(type.trim(), value);

  const unmatched = new Set<string>();
  const rows: RoiJoinedRow[] = inventory.map(row => {
    const type = row.equipmentType.trim();
    const mfg = factors.get(type);

    if (mfg === undefined) {
      unmatched.add(type);
      return {
        equipment: type,
        mfgKgco2e: null,
        co2SavedKg: null,
        carbonValueEur: null,
        lagCostEur: roundTo(row.annualSalary * LAG_COST_RATE, 2),
        netRoiEur: null,
      };
    }

    const roi = computeRoi({ ...row, equipmentType: type }, mfg, carbonPrice);
    return { ...roi, mfgKgco2e: mfg };
  });

  const netValues: number[] = [];
  for (const r of rows) if (r.netRoiEur !== null) netValues.push(r.netRoiEur);

  return {
    rows,
    warnings: [...unmatched].map(t => `No carbon factor for equipment type "${t}"`),
    totalNetRoiEur: roundTo(sum(netValues), 2),
    carbonPriceEurPerTonne: carbonPrice,
  };
}

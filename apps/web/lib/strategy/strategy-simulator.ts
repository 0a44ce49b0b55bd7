/**
 * strategy-simulator.ts — Fleet lifecycle strategy projection
 *
 * Projects monthly fleet CO2 under a strategy and the first-year financials.
 *
 *   Replacements/yr  = Fleet / Refresh_years
 *   Manufacturing    = Replacements × 200 kg × (1 − Refurb_rate × 0.85)
 *   Monthly rate     = (Mfg_current − Mfg_strategy) / 12 / Annual_CO2
 *   CO2[m+1]         = CO2[m] × (1 − rate × ramp(m)),  ramp = m/6 for m < 6, else 1
 *
 * monthsToTarget is the first month at or under target, 999 when never reached.
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import type { ReferenceData } from "@/lib/types/reference";

export const AVG_MANUFACTURING_CO2_KG = 200;
export const RECOVERY_RESIDUAL_SHARE = 0.2;
export const RAMP_MONTHS = 6;
export const NOT_REACHED = 999;

export interface StrategyParams {
  strategyKey: string;
  fleetSize: number;
  currentRefreshYears: number;
  currentRefurbRate: number;
  averageDeviceValue: number;
  averageCo2PerDevice: number;
  targetReduction?: number;
  timeHorizonMonths?: number;
}

export interface StrategyProjection {
  strategyKey: string;
  strategyName: string;
  description: string;
  monthsToTarget: number;
  reachesTarget: boolean;
  finalCo2ReductionPct: number;
  implementationCost: number;
  annualSavings: number;
  annualRecoveryValue: number;
  roiYear1: number;
  paybackMonths: number;
  monthlyCo2: number[];
}

export interface CompareParams {
  fleetSize: number;
  currentRefreshYears?: number;
  currentRefurbRate?: number;
  targetReduction?: number;
  timeHorizonMonths?: number;
}

export function simulateStrategy(
  params: StrategyParams,
  ref: ReferenceData = loadReferenceData(),
): StrategyProjection {
  const strategy = ref.strategies[params.strategyKey];
  if (!strategy) {
    throw new Error(`Unknown strategy: ${params.strategyKey}`);
  }

  const {
    fleetSize,
    currentRefreshYears,
    currentRefurbRate,
    averageDeviceValue,
    averageCo2PerDevice,
    targetReduction = 0.2,
    timeHorizonMonths = 36,
  } = params;
  const { co2ReductionFactor, priceDiscountFactor } = ref.rules.refurb;

  const currentAnnualCo2 = fleetSize * averageCo2PerDevice;
  const targetCo2 = currentAnnualCo2 * (1 - targetReduction);

  const currentReplacements = fleetSize / currentRefreshYears;
  const newReplacements = fleetSize / strategy.refreshYears;

  const currentMfgCo2 =
    currentReplacements * AVG_MANUFACTURING_CO2_KG * (1 - currentRefurbRate * co2ReductionFactor);
  const newMfgCo2 =
    newReplacements * AVG_MANUFACTURING_CO2_KG * (1 - strategy.refurbRate * co2ReductionFactor);

  const annualReduction = currentMfgCo2 - newMfgCo2;
  const monthlyRate = currentAnnualCo2 > 0 ? annualReduction / 12 / currentAnnualCo2 : 0;

  // ─── Monthly projection (month 0 .. horizon inclusive) ───
  const monthlyCo2: number[] = [];
  let co2 = currentAnnualCo2;
  let monthsToTarget: number | null = null;

  for (let month = 0; month <= timeHorizonMonths; month++) {
    monthlyCo2.push(co2);
    if (co2 <= targetCo2 && monthsToTarget === null) monthsToTarget = month;

    const ramp = month < RAMP_MONTHS ? Math.min(month / RAMP_MONTHS, 1.0) : 1.0;
    co2 = co2 * (1 - monthlyRate * ramp);
  }

  // ─── Financials ───
  const implementationCost = fleetSize * averageDeviceValue * strategy.implementationCostFactor;
  const replacementSavings = (currentReplacements - newReplacements) * averageDeviceValue;
  const refurbSavings = newReplacements * strategy.refurbRate * averageDeviceValue * priceDiscountFactor;
  const annualRecovery =
    (fleetSize / strategy.refreshYears) * strategy.recoveryRate * averageDeviceValue * RECOVERY_RESIDUAL_SHARE;

  const annualSavings = replacementSavings + refurbSavings;
  const yearOneBenefit = annualSavings + annualRecovery - implementationCost;
  const roiYear1 = implementationCost > 0 ? yearOneBenefit / implementationCost : 0;
  const payback =
    annualSavings + annualRecovery > 0 ? implementationCost / ((annualSavings + annualRecovery) / 12) : NOT_REACHED;

  const finalCo2 = monthlyCo2[monthlyCo2.length - 1];

  return {
    strategyKey: params.strategyKey,
    strategyName: strategy.name,
    description: strategy.description,
    monthsToTarget: monthsToTarget ?? NOT_REACHED,
    reachesTarget: monthsToTarget !== null,
    finalCo2ReductionPct: currentAnnualCo2 > 0 ? (currentAnnualCo2 - finalCo2) / currentAnnualCo2 : 0,
    implementationCost: roundTo(implementationCost, 2),
    annualSavings: roundTo(annualSavings, 2),
    annualRecoveryValue: roundTo(annualRecovery, 2),
    roiYear1: roundTo(roiYear1, 2),
    paybackMonths: payback < 900 ? roundTo(payback, 1) : NOT_REACHED,
    monthlyCo2,
  };
}

/** Fleet-wide averages from the device catalogue. */
export function fleetAverages(ref: ReferenceData = loadReferenceData()): {
  averageDeviceValue: number;
  averageCo2PerDevice: number;
} {
  const devices = Object.values(ref.devices);
  if (devices.length === 0) return { averageDeviceValue: 0, averageCo2PerDevice: 0 };
  const value = devices.reduce((s, d) => s + d.priceNewEur, 0);
  const co2 = devices.reduce((s, d) => s + d.co2ManufacturingKg / (d.lifespanMonths / 12), 0);
  return { averageDeviceValue: value / devices.length, averageCo2PerDevice: co2 / devices.length };
}

/** Every strategy, fastest to target first, then highest first-year ROI. */
export function compareStrategies(
  params: CompareParams,
  ref: ReferenceData = loadReferenceData(),
): StrategyProjection[] {
  const { averageDeviceValue, averageCo2PerDevice } = fleetAverages(ref);

  const results = Object.keys(ref.strategies).map(strategyKey =>
    simulateStrategy(
      {
        strategyKey,
        fleetSize: params.fleetSize,
        currentRefreshYears: params.currentRefreshYears ?? ref.rules.fleet.defaultRefreshYears,
        currentRefurbRate: params.currentRefurbRate ?? 0,
        averageDeviceValue,
        averageCo2PerDevice,
        targetReduction: params.targetReduction ?? ref.rules.fleet.defaultTargetReduction,
        timeHorizonMonths: params.timeHorizonMonths ?? 36,
      },
      ref,
    ),
  );

  return results.sort((a, b) => a.monthsToTarget - b.monthsToTarget || b.roiYear1 - a.roiYear1);
}

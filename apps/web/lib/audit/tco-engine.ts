/**
 * tco-engine.ts — Annual total cost of ownership per scenario
 *
 * Pure arithmetic over the reference tables. No I/O beyond the cached tables.
 *
 *   TCO_keep   = Energy + Productivity_loss + (Residual(age) − Residual(age+1))
 *   TCO_new    = Price/Lifespan + Energy + Disposal/Lifespan − Residual(1)/Lifespan
 *   TCO_refurb = Price_refurb/Warranty + Energy×(1+penalty) + Productivity_loss(1.5y)
 *                + Disposal/Warranty − Price_refurb×0.2/Warranty
 */

import {
  getDepreciationRate,
  getDisposalCost,
  isPremiumDevice,
  loadReferenceData,
} from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import type { ReferenceData } from "@/lib/types/reference";
import type { TcoResult } from "@/lib/types/audit";

const UNAVAILABLE: TcoResult = { total: Infinity, breakdown: {}, available: false };

/** Device power-on hours per year for a persona. */
export function annualHours(personaName: string, ref: ReferenceData = loadReferenceData()): number {
  const persona = ref.personas[personaName];
  if (!persona) return 0;
  return persona.dailyHours * ref.rules.energy.workingDaysPerYear;
}

/** Energy_Cost = Power_kW × Hours_Annual × Price_kWh */
export function calculateEnergyCost(
  deviceName: string,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): number {
  const device = ref.devices[deviceName];
  if (!device || !ref.personas[personaName]) return 0;
  return roundTo(device.powerKw * annualHours(personaName, ref) * ref.rules.energy.priceKwhEur, 2);
}

/**
 * Loss_Pct  = min((age − optimal) × degradation, max_degradation), 0 below optimal
 * Loss_Cost = Salary × Loss_Pct × Lag_Sensitivity
 */
export function calculateProductivityLoss(
  ageYears: number,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): { lossPct: number; lossCost: number } {
  const persona = ref.personas[personaName];
  if (!persona) return { lossPct: 0, lossCost: 0 };

  const { optimalYears, degradationPerYear, maxDegradation } = ref.rules.productivity;
  const lossPct = ageYears <= optimalYears
    ? 0
    : Math.min((ageYears - optimalYears) * degradationPerYear, maxDegradation);

  return {
    lossPct: roundTo(lossPct, 4),
    lossCost: roundTo(persona.salaryEur * lossPct * persona.lagSensitivity, 2),
  };
}

/** Residual = Price_new × Depreciation_rate (+ premium bonus, capped at 1) */
export function calculateResidualValue(
  deviceName: string,
  ageYears: number,
  ref: ReferenceData = loadReferenceData(),
): number {
  const device = ref.devices[deviceName];
  if (!device) return 0;

  let rate = getDepreciationRate(ageYears, ref);
  if (isPremiumDevice(deviceName, ref)) {
    rate = Math.min(rate + ref.rules.depreciation.premiumRetentionBonus, 1.0);
  }
  return roundTo(device.priceNewEur * rate, 2);
}

/** Keep the current device for one more year. */
export function calculateTcoKeep(
  deviceName: string,
  ageYears: number,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): TcoResult {
  if (!ref.devices[deviceName]) return { total: 0, breakdown: {}, productivityLossPct: 0, available: true };

  const energy = calculateEnergyCost(deviceName, personaName, ref);
  const { lossPct, lossCost } = calculateProductivityLoss(ageYears, personaName, ref);
  const residualLoss =
    calculateResidualValue(deviceName, ageYears, ref) - calculateResidualValue(deviceName, ageYears + 1, ref);

  return {
    total: roundTo(energy + lossCost + residualLoss, 2),
    breakdown: { energy, productivityLoss: lossCost, residualLoss },
    productivityLossPct: lossPct,
    available: true,
  };
}

/** Buy a new device, annualized over its lifespan. */
export function calculateTcoNew(
  deviceName: string,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): TcoResult {
  const device = ref.devices[deviceName];
  if (!device) return { total: 0, breakdown: {}, available: true };

  const lifespanYears = device.lifespanMonths / 12;
  const purchase = device.priceNewEur / lifespanYears;
  const energy = calculateEnergyCost(deviceName, personaName, ref);
  const disposal = getDisposalCost(deviceName, ref) / lifespanYears;
  const residualBenefit = calculateResidualValue(deviceName, 1, ref) / lifespanYears;

  return {
    total: roundTo(purchase + energy + disposal - residualBenefit, 2),
    breakdown: {
      purchase: roundTo(purchase, 2),
      energy,
      disposal: roundTo(disposal, 2),
      residualBenefit: roundTo(residualBenefit, 2),
    },
    available: true,
  };
}

/** Buy a refurbished unit of the same model over the refurb warranty period. */
export function calculateTcoRefurb(
  deviceName: string,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): TcoResult {
  const device = ref.devices[deviceName];
  if (!device) return { total: 0, breakdown: {}, available: false };
  if (!device.refurbAvailable) return UNAVAILABLE;

  const refurb = ref.rules.refurb;
  const priceRefurb = device.priceNewEur * (1 - refurb.priceDiscountFactor);
  const years = refurb.warrantyYears;

  const purchase = priceRefurb / years;
  const energy = calculateEnergyCost(deviceName, personaName, ref) * (1 + refurb.energyPenaltyFactor);
  const { lossPct, lossCost } = calculateProductivityLoss(refurb.equivalentAgeYears, personaName, ref);
  const disposal = getDisposalCost(deviceName, ref) / years;
  const residualBenefit = (priceRefurb * refurb.residualShare) / years;

  return {
    total: roundTo(purchase + energy + lossCost + disposal - residualBenefit, 2),
    breakdown: {
      purchase: roundTo(purchase, 2),
      energy: roundTo(energy, 2),
      productivityLoss: lossCost,
      disposal: roundTo(disposal, 2),
      residualBenefit: roundTo(residualBenefit, 2),
    },
    productivityLossPct: lossPct,
    available: true,
  };
}

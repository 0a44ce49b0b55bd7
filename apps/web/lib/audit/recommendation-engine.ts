/**
 * recommendation-engine.ts — Keep / Buy new / Buy refurbished
 *
 * Evaluates the three scenarios, scores them for the optimization goal and
 * returns the argmin. Options are scored in declaration order
 * (KEEP, NEW, REFURBISHED); the first minimal score wins a tie.
 *
 *   cost_first → score = TCO
 *   eco_first  → score = CO2
 *   balanced   → score = (TCO / max TCO + CO2 / max CO2) / 2
 *
 * A HIGH urgency device is never kept.
 */

import {
  loadReferenceData,
  resolveDeviceName,
  resolvePersonaName,
} from "@/lib/registry/readReferenceData";
import { calculateResidualValue, calculateTcoKeep, calculateTcoNew, calculateTcoRefurb } from "./tco-engine";
import { calculateCo2Keep, calculateCo2New, calculateCo2Refurb } from "./co2-engine";
import { calculateUrgency } from "./urgency-engine";
import type { ReferenceData } from "@/lib/types/reference";
import type { DeviceAnalysis, DeviceAuditInput, OptimizationGoal, Recommendation } from "@/lib/types/audit";

export const OPTIMIZATION_GOALS: OptimizationGoal[] = ["balanced", "cost_first", "eco_first"];

interface ScoredOption {
  option: Recommendation;
  tco: number;
  co2: number;
}

/** Score each option for the goal. */
export function scoreOptions(options: ScoredOption[], goal: OptimizationGoal): Map<Recommendation, number> {
  const maxTco = Math.max(...options.map(o => o.tco)) || 1;
  const maxCo2 = Math.max(...options.map(o => o.co2)) || 1;

  const scores = new Map<Recommendation, number>();
  for (const o of options) {
    if (goal === "cost_first") {
      scores.set(o.option, o.tco);
    } else if (goal === "eco_first") {
      scores.set(o.option, o.co2);
    } else {
      const tcoNorm = maxTco > 0 ? o.tco / maxTco : 0;
      const co2Norm = maxCo2 > 0 ? o.co2 / maxCo2 : 0;
      scores.set(o.option, (tcoNorm + co2Norm) / 2);
    }
  }
  return scores;
}

/** First key with the minimal score, in insertion order. */
export function argmin<K>(scores: Map<K, number>): K {
  let best: K | undefined;
  let bestScore = Infinity;
  for (const [key, score] of scores) {
    if (best === undefined || score < bestScore) {
      best = key;
      bestScore = score;
    }
  }
  if (best === undefined) throw new Error("argmin of an empty score set");
  return best;
}

export function analyzeDevice(
  input: DeviceAuditInput,
  ref: ReferenceData = loadReferenceData(),
): DeviceAnalysis {
  const goal = input.goal ?? "balanced";
  const { ageYears, country, gridFactorOverride } = input;
  const deviceName = resolveDeviceName(input.deviceName, ref);
  const persona = resolvePersonaName(input.persona, ref);

  const tcoKeep = calculateTcoKeep(deviceName, ageYears, persona, ref);
  const tcoNew = calculateTcoNew(deviceName, persona, ref);
  const tcoRefurb = calculateTcoRefurb(deviceName, persona, ref);

  const co2Keep = calculateCo2Keep(deviceName, persona, country, ref, gridFactorOverride);
  const co2New = calculateCo2New(deviceName, persona, country, ref, gridFactorOverride);
  const co2Refurb = calculateCo2Refurb(deviceName, persona, country, ref, gridFactorOverride);

  const urgency = calculateUrgency(ageYears, persona, ref);
  const residual = calculateResidualValue(deviceName, ageYears, ref);
  const refurbAvailable = tcoRefurb.available;

  const options: ScoredOption[] = [
    { option: "KEEP", tco: tcoKeep.total, co2: co2Keep.total },
    { option: "NEW", tco: tcoNew.total, co2: co2New.total },
  ];
  if (refurbAvailable) {
    options.push({ option: "REFURBISHED", tco: tcoRefurb.total, co2: co2Refurb.total });
  }

  const scores = scoreOptions(options, goal);
  let best = argmin(scores);
  let rationale: string;

  if (urgency.level === "HIGH" && best === "KEEP") {
    best = refurbAvailable ? "REFURBISHED" : "NEW";
    rationale = "High urgency: device requires replacement due to age/performance";
  } else if (best === "KEEP") {
    rationale = `Cost-effective to maintain. Annual TCO: €${tcoKeep.total.toFixed(0)}`;
  } else if (best === "REFURBISHED") {
    const savings = tcoKeep.total - tcoRefurb.total;
    const co2Saved = co2New.total - co2Refurb.total;
    rationale = `Best value: saves €${savings.toFixed(0)}/year and ${co2Saved.toFixed(1)}kg CO2 vs new`;
  } else {
    rationale = "New device recommended for optimal performance and reliability";
  }

  if (residual > 50 && best !== "KEEP") {
    rationale += `. Current device recoverable value: €${residual.toFixed(0)}`;
  }

  const refurbTco = refurbAvailable ? tcoRefurb.total : Infinity;
  const refurbCo2 = refurbAvailable ? co2Refurb.total : Infinity;
  const bestTco = Math.min(tcoKeep.total, tcoNew.total, refurbTco);
  const bestCo2 = Math.min(co2Keep.total, co2New.total, refurbCo2);

  return {
    deviceName,
    ageYears,
    persona,
    country,
    recommendation: best,
    urgency: urgency.level,
    urgencyScore: urgency.score,
    urgencyRationale: urgency.rationale,
    tcoKeep: tcoKeep.total,
    tcoNew: tcoNew.total,
    tcoRefurb: refurbAvailable ? tcoRefurb.total : null,
    residualValue: residual,
    annualSavings: Math.max(0, tcoKeep.total - bestTco),
    co2Keep: co2Keep.total,
    co2New: co2New.total,
    co2Refurb: refurbAvailable ? co2Refurb.total : null,
    co2Savings: Math.max(0, co2Keep.total - bestCo2),
    productivityLossPct: tcoKeep.productivityLossPct ?? 0,
    energyCostAnnual: tcoKeep.breakdown.energy ?? 0,
    scores: Object.fromEntries(scores),
    rationale,
    businessUnit: "",
  };
}

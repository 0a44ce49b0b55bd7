/**
 * urgency-engine.ts — Replacement urgency scoring (ITIL v4 priority matrix)
 *
 *   Score = 1 + Age_factor + Performance_factor + Sensitivity_factor
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import { calculateProductivityLoss } from "./tco-engine";
import type { ReferenceData, UrgencyLevel } from "@/lib/types/reference";
import type { UrgencyResult } from "@/lib/types/audit";

const HIGH_IMPACT_SENSITIVITY = 2.0;

export function calculateUrgency(
  ageYears: number,
  personaName: string,
  ref: ReferenceData = loadReferenceData(),
): UrgencyResult {
  const cfg = ref.rules.urgency;
  let score = 1.0;
  const factors: string[] = [];

  if (ageYears >= cfg.ageCriticalYears) {
    score += 1.5;
    factors.push(`Device age (${ageYears.toFixed(1)}y) exceeds critical threshold (${cfg.ageCriticalYears}y)`);
  } else if (ageYears >= cfg.ageHighYears) {
    score += 0.8;
    factors.push(`Device age (${ageYears.toFixed(1)}y) above recommended (${cfg.ageHighYears}y)`);
  }

  const { lossPct } = calculateProductivityLoss(ageYears, personaName, ref);
  const performance = 1 - lossPct;
  if (performance < cfg.performanceThreshold) {
    score += 0.7;
    factors.push(`Performance degraded to ${(performance * 100).toFixed(0)}%`);
  }

  const sensitivity = ref.personas[personaName]?.lagSensitivity ?? 1.0;
  if (sensitivity >= HIGH_IMPACT_SENSITIVITY) {
    score += 0.3;
    factors.push(`High-impact role (${personaName})`);
  }

  let level: UrgencyLevel = "LOW";
  if (score >= cfg.thresholds.HIGH) level = "HIGH";
  else if (score >= cfg.thresholds.MEDIUM) level = "MEDIUM";

  return {
    score: roundTo(score, 2),
    level,
    rationale: factors.length > 0 ? factors.join(" | ") : "Device within normal parameters",
  };
}

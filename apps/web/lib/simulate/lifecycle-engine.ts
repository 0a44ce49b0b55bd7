/**
 * lifecycle-engine.ts — Lifecycle optimizer v2 (keep / new / refurbished)
 *
 * Composite score per scenario:
 *   score = Fin × w_fin + Env_monetised × (1 − w_fin)
 *   Env_monetised = Env_kg / 1000 × Carbon_price × Weight_multiplier
 *
 * Refurbished units get 70% of the nominal life and start lagging after 1.5 years.
 * Lag cost = 30 h × (age − trigger) × sensitivity × hourly salary, 0 below trigger.
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import type { ReferenceData, SimulatorRules } from "@/lib/types/reference";

// ─── Types ────────────────────────────────────────────────────────────────────

export type LifecycleScenario = "keep" | "new" | "refurb";

export interface ScenarioResult {
  fin: number;          // € / year
  env: number;          // kg CO2e / year
  score: number;
  lag: number;          // € / year, included in fin
  lifeYears: number | null;   // null = extending the current device
}

export interface SimulationInput {
  device: string;
  persona: string;
  ageYears: number;
  financialWeightPct: number;
}

export interface SimulationResult {
  device: string;
  persona: string;
  ageYears: number;
  financialWeightPct: number;
  scenarios: Record<LifecycleScenario, ScenarioResult>;
  best: LifecycleScenario;
  headline: string;
}

const SCENARIO_ORDER: LifecycleScenario[] = ["keep", "new", "refurb"];

// ─── Engine ───────────────────────────────────────────────────────────────────

export function calculateLagCost(
  ageYears: number,
  sensitivity: number,
  hourlySalary: number,
  rules: SimulatorRules,
  refurbished = false,
): number {
  const trigger = refurbished ? rules.lagRefurbTrigger : rules.lagNewTrigger;
  if (ageYears <= trigger) return 0;
  return rules.lagHoursPerYear * (ageYears - trigger) * sensitivity * hourlySalary;
}

export function runSimulation(
  input: SimulationInput,
  ref: ReferenceData = loadReferenceData(),
): SimulationResult {
  const sim = ref.simulator;
  const rules = sim.rules;
  const device = input.device in sim.assets ? input.device : sim.fallbackAsset;
  const persona = input.persona in sim.personas ? input.persona : sim.fallbackPersona;
  const asset = sim.assets[device];
  const p = sim.personas[persona];

  const weightPct = Math.max(0, Math.min(100, input.financialWeightPct));
  const wFin = weightPct / 100;
  const wEnv = 1 - wFin;

  const monetise = (kg: number) => (kg / 1000) * rules.carbonPrice * rules.weightMultiplier;
  const score = (fin: number, env: number) => fin * wFin + monetise(env) * wEnv;

  // Keep: lag on the current device, older hardware draws more power
  const lagKeep = calculateLagCost(input.ageYears, p.sensitivity, p.salary, rules);
  const envKeep = asset.energy * rules.keepEnergyPenalty * rules.gridFactor;

  // New: annualized price, manufacturing amortized over the life
  const finNew = asset.price / asset.life;
  const envNew = asset.prodCo2 / asset.life + asset.energy * rules.gridFactor;

  // Refurbished: shorter life, mid-life lag, reduced production debt
  const refurbLife = asset.life * rules.lifeFactor;
  const lagRefurb = calculateLagCost(refurbLife / 2, p.sensitivity, p.salary, rules, true);
  const finRefurb = asset.priceRefurb / refurbLife + lagRefurb;
  const envRefurb =
    (asset.prodCo2 * rules.refurbProdDebt) / refurbLife + asset.energy * rules.energyPenalty * rules.gridFactor;

  const scenarios: Record<LifecycleScenario, ScenarioResult> = {
    keep: { fin: lagKeep, env: envKeep, score: score(lagKeep, envKeep), lag: lagKeep, lifeYears: null },
    new: { fin: finNew, env: envNew, score: score(finNew, envNew), lag: 0, lifeYears: asset.life },
    refurb: {
      fin: finRefurb,
      env: envRefurb,
      score: score(finRefurb, envRefurb),
      lag: lagRefurb,
      lifeYears: Math.round(refurbLife * 10) / 10,
    },
  };

  let best: LifecycleScenario = SCENARIO_ORDER[0];
  for (const key of SCENARIO_ORDER) {
    if (scenarios[key].score < scenarios[best].score) best = key;
  }

  return {
    device,
    persona,
    ageYears: input.ageYears,
    financialWeightPct: weightPct,
    scenarios,
    best,
    headline: headlineFor(best, input.ageYears, persona),
  };
}

function headlineFor(best: LifecycleScenario, ageYears: number, persona: string): string {
  switch (best) {
    case "keep":
      return `Keep existing: ${ageYears}-year-old hardware is still the most efficient choice for ${persona}`;
    case "refurb":
      return "Buy refurbished: the reduced production carbon debt outweighs the shorter life and earlier lag";
    case "new":
      return `Buy new: ${persona} cannot afford the early performance decay of refurbished units`;
  }
}

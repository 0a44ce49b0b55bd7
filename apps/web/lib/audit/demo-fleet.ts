/**
 * demo-fleet.ts — Deterministic sample fleet for demos and the report script
 *
 * Seeded PRNG (mulberry32) so a given (n, seed) always yields the same fleet.
 */

import { businessUnitNames, loadReferenceData, personaNames } from "@/lib/registry/readReferenceData";
import type { ReferenceData } from "@/lib/types/reference";
import type { FleetRow } from "@/lib/types/audit";

const DEVICE_MIX: Array<[string, number]> = [
  ["Laptop (Standard)", 0.35],
  ["Smartphone (Generic)", 0.25],
  ["iPhone 14 (Alternative)", 0.10],
  ["Tablet", 0.10],
  ["Scanner (Logistics)", 0.08],
  ["Workstation", 0.05],
  ["Screen (Monitor)", 0.05],
  ["Switch/Router", 0.02],
];

const PERSONA_WEIGHTS = [0.40, 0.35, 0.10, 0.15];

const COUNTRY_POOL = ["FR", "FR", "FR", "US", "US", "CN", "CN", "JP", "DE", "IT", "UK", "HK"];

const AGE_MEAN = 3.5;
const AGE_STDDEV = 1.2;
const AGE_MIN = 0.5;
const AGE_MAX = 7;

export type Rng = () => number;

/** mulberry32: 32-bit seeded generator, uniform in [0, 1). */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Box–Muller transform. */
export function gaussian(rng: Rng, mean: number, stddev: number): number {
  const u1 = rng() || Number.MIN_VALUE;
  const u2 = rng();
  return mean + stddev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Pick one item; weights need not sum to 1. */
export function weightedChoice<T>(rng: Rng, items: T[], weights: number[]): T {
  const total = weights.reduce((s, w) => s + w, 0);
  let r = rng() * total;
  for (let i = 0; i < items.length; i++) {
    r -= weights[i] ?? 0;
    if (r < 0) return items[i];
  }
  return items[items.length - 1];
}

export function generateDemoFleet(
  n = 50,
  seed = 42,
  ref: ReferenceData = loadReferenceData(),
): FleetRow[] {
  const rng = mulberry32(seed);

  const devices = DEVICE_MIX.map(([name]) => name);
  const deviceWeights = DEVICE_MIX.map(([, w]) => w);
  const personas = personaNames(ref);
  const units = businessUnitNames(ref);
  const unitWeights = units.map(u => ref.businessUnits[u].estimatedFleetSize);

  const fleet: FleetRow[] = [];
  for (let i = 0; i < n; i++) {
    const age = Math.max(AGE_MIN, Math.min(AGE_MAX, gaussian(rng, AGE_MEAN, AGE_STDDEV)));
    fleet.push({
      deviceModel: weightedChoice(rng, devices, deviceWeights),
      ageYears: Math.round(age * 10) / 10,
      persona: weightedChoice(rng, personas, PERSONA_WEIGHTS),
      country: COUNTRY_POOL[Math.floor(rng() * COUNTRY_POOL.length)],
      businessUnit: weightedChoice(rng, units, unitWeights),
    });
  }
  return fleet;
}

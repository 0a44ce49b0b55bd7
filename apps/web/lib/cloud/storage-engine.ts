/**
 * storage-engine.ts — Cloud storage footprint and archival strategy
 *
 *   Energy     = GB × 1.2 kWh/GB/yr
 *   Emissions  = Energy × Intensity (g CO2/kWh) / 1000  → kg
 *   Water      = Energy × 1.9 L/kWh
 *   Cost       = (GB_standard × €/GB/month + GB_archive × €/GB/month) × 12
 *
 * Archiving a GB removes 90% of its emissions and water.
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import type { CloudStorageOffer, ReferenceData } from "@/lib/types/reference";

export const KWH_PER_GB_PER_YEAR = 1.2;
export const LITERS_PER_KWH = 1.9;
export const LITERS_PER_GB_PER_YEAR = KWH_PER_GB_PER_YEAR * LITERS_PER_KWH;
export const ARCHIVAL_WATER_REDUCTION = 0.90;
export const ARCHIVAL_CO2_REDUCTION = 0.90;
export const CO2_PER_TREE_PER_YEAR = 22;
export const LITERS_PER_SHOWER = 50;
export const OLYMPIC_POOL_LITERS = 2_500_000;

export const STANDARD_EUR_PER_GB_MONTH = 0.022;
export const ARCHIVE_EUR_PER_GB_MONTH = 0.004;

/** Tolerance on the target when flagging a projection year as compliant. */
export const TARGET_TOLERANCE_KG = 5;

const DEFAULT_PROVIDER = "AWS";
const DEFAULT_CO2_KG_TB_MONTH = 6.0;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ArchivalProjectionYear {
  year: number;
  storageGb: number;
  storageTb: number;
  emissionsWithoutArchivalKg: number;
  waterWithoutArchivalL: number;
  costWithoutArchivalEur: number;
  archiveGb: number;
  archiveTb: number;
  emissionsAfterArchivalKg: number;
  waterAfterArchivalL: number;
  waterSavingsL: number;
  costAfterArchivalEur: number;
  costSavingsEur: number;
  meetsTarget: boolean;
}

export interface ArchivalStrategyYear {
  year: number;
  storageTb: number;
  archiveTb: number;
  emissionsWithoutArchivalKg: number;
  emissionsAfterArchivalKg: number;
  waterSavingsL: number;
  costSavingsEur: number;
  meetsTarget: boolean;
}

export interface BaselineMetrics {
  emissionsKg: number;
  waterLiters: number;
  showers: number;
  trees: number;
  olympicPools: number;
}

export interface CumulativeSavings {
  co2SavedKg: number;
  waterSavedL: number;
  eurSaved: number;
  showersSaved: number;
  treesEquivalent: number;
  olympicPools: number;
}

export interface ArchivalNeededParams {
  currentStorageGb: number;
  targetEmissionsKg: number;
  carbonIntensity: number;
  yearsAhead: number;
  annualGrowthRate: number;          // fraction, 0.1 = 10%
  archivalReduction: number;         // fraction of per-GB emissions removed by archiving
  standardCostPerGbMonth: number;
  archiveCostPerGbMonth: number;
}

export interface ArchivalStrategyParams {
  storageGb: number;
  reductionTargetPct: number;
  dataGrowthRatePct: number;
  carbonIntensity: number;
  projectionYears: number;
}

// ─── Base formulas ────────────────────────────────────────────────────────────

export function calculateAnnualEmissions(storageGb: number, carbonIntensity: number): number {
  return (storageGb * KWH_PER_GB_PER_YEAR * carbonIntensity) / 1000;
}

export function calculateAnnualWater(storageGb: number): number {
  return storageGb * LITERS_PER_GB_PER_YEAR;
}

export function calculateAnnualCost(
  storageGb: number,
  archivalGb: number,
  standardCostPerGbMonth: number,
  archiveCostPerGbMonth: number,
): number {
  const standardGb = storageGb - archivalGb;
  return standardGb * standardCostPerGbMonth * 12 + archivalGb * archiveCostPerGbMonth * 12;
}

function clamp(v: number, min: number, max: number): number {
  return Math.min(Math.max(v, min), max);
}

// ─── Projections ──────────────────────────────────────────────────────────────

/** Year-by-year archive volume needed to hold emissions at an absolute target. */
export function calculateArchivalNeeded(p: ArchivalNeededParams): ArchivalProjectionYear[] {
  const co2PerGb = calculateAnnualEmissions(1, p.carbonIntensity);
  const waterPerGb = calculateAnnualWater(1);
  const rows: ArchivalProjectionYear[] = [];

  for (let year = 1; year <= Math.floor(p.yearsAhead); year++) {
    const storageGb = p.currentStorageGb * (1 + p.annualGrowthRate) ** year;
    const emissions = calculateAnnualEmissions(storageGb, p.carbonIntensity);
    const water = calculateAnnualWater(storageGb);
    const costWithout = calculateAnnualCost(storageGb, 0, p.standardCostPerGbMonth, p.archiveCostPerGbMonth);

    let archiveGb = 0;
    if (emissions > p.targetEmissionsKg && p.archivalReduction > 0) {
      archiveGb = clamp((emissions - p.targetEmissionsKg) / (co2PerGb * p.archivalReduction), 0, storageGb);
    }

    const emissionsAfter = emissions - archiveGb * co2PerGb * p.archivalReduction;
    const waterSavings = archiveGb * waterPerGb * ARCHIVAL_WATER_REDUCTION;
    const costWith = calculateAnnualCost(storageGb, archiveGb, p.standardCostPerGbMonth, p.archiveCostPerGbMonth);

    rows.push({
      year,
      storageGb,
      storageTb: storageGb / 1024,
      emissionsWithoutArchivalKg: emissions,
      waterWithoutArchivalL: water,
      costWithoutArchivalEur: costWithout,
      archiveGb,
      archiveTb: archiveGb / 1024,
      emissionsAfterArchivalKg: emissionsAfter,
      waterAfterArchivalL: water - waterSavings,
      waterSavingsL: waterSavings,
      costAfterArchivalEur: costWith,
      costSavingsEur: costWithout - costWith,
      meetsTarget: emissionsAfter <= p.targetEmissionsKg + TARGET_TOLERANCE_KG,
    });
  }
  return rows;
}

/** Year-by-year archive volume for a percentage cut against business as usual. */
export function calculateArchivalStrategy(p: ArchivalStrategyParams): ArchivalStrategyYear[] {
  const reductionFactor = 1 - p.reductionTargetPct / 100;
  const co2PerGb = calculateAnnualEmissions(1, p.carbonIntensity);
  const rows: ArchivalStrategyYear[] = [];

  for (let year = 1; year <= Math.floor(p.projectionYears); year++) {
    const storageGb = p.storageGb * (1 + p.dataGrowthRatePct / 100) ** year;
    const bauEmissions = calculateAnnualEmissions(storageGb, p.carbonIntensity);
    const bauWater = calculateAnnualWater(storageGb);
    const bauCost = calculateAnnualCost(storageGb, 0, STANDARD_EUR_PER_GB_MONTH, ARCHIVE_EUR_PER_GB_MONTH);

    const target = bauEmissions * reductionFactor;
    const archiveGb =
      co2PerGb > 0 ? clamp((bauEmissions - target) / (co2PerGb * ARCHIVAL_CO2_REDUCTION), 0, storageGb) : 0;

    const finalEmissions = bauEmissions - archiveGb * co2PerGb * ARCHIVAL_CO2_REDUCTION;
    const waterPerGb = storageGb > 0 ? bauWater / storageGb : 0;
    const finalWater = bauWater - archiveGb * waterPerGb * ARCHIVAL_WATER_REDUCTION;
    const finalCost = calculateAnnualCost(storageGb, archiveGb, STANDARD_EUR_PER_GB_MONTH, ARCHIVE_EUR_PER_GB_MONTH);

    rows.push({
      year,
      storageTb: storageGb / 1024,
      archiveTb: archiveGb / 1024,
      emissionsWithoutArchivalKg: bauEmissions,
      emissionsAfterArchivalKg: finalEmissions,
      waterSavingsL: bauWater - finalWater,
      costSavingsEur: bauCost - finalCost,
      meetsTarget: true,
    });
  }
  return rows;
}

export function calculateCumulativeSavings(
  rows: Array<Pick<ArchivalStrategyYear, "emissionsWithoutArchivalKg" | "emissionsAfterArchivalKg" | "waterSavingsL" | "costSavingsEur">>,
): CumulativeSavings {
  let co2 = 0;
  let water = 0;
  let eur = 0;
  for (const r of rows) {
    co2 += r.emissionsWithoutArchivalKg - r.emissionsAfterArchivalKg;
    water += r.waterSavingsL;
    eur += r.costSavingsEur;
  }
  return {
    co2SavedKg: co2,
    waterSavedL: water,
    eurSaved: eur,
    showersSaved: water / LITERS_PER_SHOWER,
    treesEquivalent: co2 / CO2_PER_TREE_PER_YEAR,
    olympicPools: water / OLYMPIC_POOL_LITERS,
  };
}

// ─── Providers ────────────────────────────────────────────────────────────────

export function getCloudProviders(ref: ReferenceData = loadReferenceData()): string[] {
  return [...new Set(ref.cloudOffers.map(o => o.provider))];
}

export function offersFor(providers: string[], ref: ReferenceData = loadReferenceData()): CloudStorageOffer[] {
  const selected = providers.length > 0 ? providers : [DEFAULT_PROVIDER];
  return ref.cloudOffers.filter(o => selected.includes(o.provider));
}

/**
 * Grid-equivalent intensity (g CO2/kWh) from the first listed offer of the
 * selected providers:  kg/TB/month × 12 / (1024 GB × 1.2 kWh) × 1000
 */
export function calculateCarbonIntensity(providers: string[], ref: ReferenceData = loadReferenceData()): number {
  const first = offersFor(providers, ref)[0];
  const co2 = first ? first.co2KgTbMonth : DEFAULT_CO2_KG_TB_MONTH;
  return ((co2 * 12) / (1024 * KWH_PER_GB_PER_YEAR)) * 1000;
}

export function calculateBaselineMetrics(storageGb: number, carbonIntensity: number): BaselineMetrics {
  const emissionsKg = calculateAnnualEmissions(storageGb, carbonIntensity);
  const waterLiters = calculateAnnualWater(storageGb);
  return {
    emissionsKg,
    waterLiters,
    showers: waterLiters / LITERS_PER_SHOWER,
    trees: emissionsKg / CO2_PER_TREE_PER_YEAR,
    olympicPools: waterLiters / OLYMPIC_POOL_LITERS,
  };
}

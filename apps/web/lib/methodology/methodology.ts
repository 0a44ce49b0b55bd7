/**
 * methodology.ts — Assumptions, calculation methods and uncertainty ranges
 *
 * Every figure the calculators produce traces back to an assumption with a
 * source and a confidence level. Ranges widen with lower confidence:
 *   HIGH ±10% · MEDIUM ±25% · LOW ±50% · THEORETICAL ±75%
 * unless the assumption carries an explicit low/high range.
 */

import { loadReferenceData } from "@/lib/registry/readReferenceData";
import { roundTo } from "@/lib/math";
import { DISCLAIMERS } from "./disclaimers";
import type { Assumption, CalculationMethod, ConfidenceLevel, ReferenceData } from "@/lib/types/reference";

export const CONFIDENCE_LEVELS: ConfidenceLevel[] = ["HIGH", "MEDIUM", "LOW", "THEORETICAL"];

export const CONFIDENCE_VARIANCE: Record<ConfidenceLevel, number> = {
  HIGH: 0.10,
  MEDIUM: 0.25,
  LOW: 0.50,
  THEORETICAL: 0.75,
};

const CONFIDENCE_DESCRIPTIONS: Record<ConfidenceLevel, string> = {
  HIGH: "Official sources, measured data",
  MEDIUM: "Industry benchmarks, may vary",
  LOW: "Estimates, significant uncertainty",
  THEORETICAL: "Model-based, not validated",
};

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RangedValue {
  value: number;
  low: number;
  high: number;
  confidence: ConfidenceLevel | "UNKNOWN";
  note: string;
}

export interface StrandedValueRange {
  theoreticalValue: number;
  realisticLow: number;
  realisticMid: number;
  realisticHigh: number;
  confidence: ConfidenceLevel;
  note: string;
  displayRange: string;
}

export interface Co2SavingsRange {
  lowTonnes: number;
  midTonnes: number;
  highTonnes: number;
  confidence: ConfidenceLevel;
  note: string;
  source: string;
}

// ─── Lookups ──────────────────────────────────────────────────────────────────

export function getAssumptions(ref: ReferenceData = loadReferenceData()): Record<string, Assumption> {
  return ref.methodology.assumptions;
}

export function getCalculationMethods(ref: ReferenceData = loadReferenceData()): Record<string, CalculationMethod> {
  return ref.methodology.methods;
}

function hasExplicitRange(a: Assumption): a is Assumption & { rangeLow: number; rangeHigh: number } {
  return Boolean(a.rangeLow) && Boolean(a.rangeHigh);
}

// ─── Ranges ───────────────────────────────────────────────────────────────────

export function calculateWithRange(
  baseValue: number,
  assumptionKey: string,
  ref: ReferenceData = loadReferenceData(),
): RangedValue {
  const assumption = ref.methodology.assumptions[assumptionKey];
  if (!assumption) {
    return { value: baseValue, low: baseValue, high: baseValue, confidence: "UNKNOWN", note: "No assumption data available" };
  }

  let low: number;
  let high: number;
  if (hasExplicitRange(assumption)) {
    const v = assumption.value;
    const ratioLow = typeof v === "number" && v !== 0 ? assumption.rangeLow / v : 1;
    const ratioHigh = typeof v === "number" && v !== 0 ? assumption.rangeHigh / v : 1;
    low = baseValue * ratioLow;
    high = baseValue * ratioHigh;
  } else {
    const variance = CONFIDENCE_VARIANCE[assumption.confidence];
    low = baseValue * (1 - variance);
    high = baseValue * (1 + variance);
  }

  return {
    value: baseValue,
    low: roundTo(low, 2),
    high: roundTo(high, 2),
    confidence: assumption.confidence,
    note: assumption.notes ?? "",
  };
}

/**
 * Theoretical residual value locked in the fleet, with realistic bands.
 * Bands combine resale participation (30/50/70%) and bulk discount (40/60/80%).
 */
export function getStrandedValueRange(fleetSize: number, avgAgeYears: number, avgPrice = 1150): StrandedValueRange {
  const base = fleetSize * avgPrice * 0.70 ** avgAgeYears;
  const eur = (v: number) => `€${v.toLocaleString("en-US", { maximumFractionDigits: 0 })}`;

  return {
    theoreticalValue: Math.round(base),
    realisticLow: Math.round(base * 0.30 * 0.40),
    realisticMid: Math.round(base * 0.50 * 0.60),
    realisticHigh: Math.round(base * 0.70 * 0.80),
    confidence: "LOW",
    note:
      "Stranded value assumes devices can be resold. In practice, actual recoverable value is " +
      "typically 15-35% of theoretical value.",
    displayRange: `${eur(base * 0.15)} - ${eur(base * 0.35)}`,
  };
}

/** Avoidable manufacturing CO2 per year at 70 / 80 / 91% refurb savings. */
export function getCo2SavingsRange(fleetSize: number, refreshCycleYears: number, refurbRate = 0.40): Co2SavingsRange {
  const AVG_CO2_PER_DEVICE_KG = 365;
  const base = (fleetSize / refreshCycleYears) * refurbRate * AVG_CO2_PER_DEVICE_KG;

  return {
    lowTonnes: roundTo((base * 0.70) / 1000, 1),
    midTonnes: roundTo((base * 0.80) / 1000, 1),
    highTonnes: roundTo((base * 0.91) / 1000, 1),
    confidence: "MEDIUM",
    note: "CO₂ savings range reflects different industry claims: Dell (80%), Apple (85%), Back Market (91%).",
    source: "Dell Circular Economy Report 2023, Apple Environmental Report 2023",
  };
}

// ─── Text output ──────────────────────────────────────────────────────────────

export function getAssumptionTooltip(key: string, ref: ReferenceData = loadReferenceData()): string {
  const a = ref.methodology.assumptions[key];
  if (!a) return "";

  let tooltip = `${a.name}: ${a.value} ${a.unit}`;
  if (hasExplicitRange(a)) tooltip += ` (range: ${a.rangeLow}-${a.rangeHigh})`;
  tooltip += ` | Source: ${a.source}`;
  if (a.notes) tooltip += ` | Note: ${a.notes}`;
  return tooltip;
}

export function generateMethodologyMarkdown(ref: ReferenceData = loadReferenceData()): string {
  const lines: string[] = [
    "# GreenFleet Methodology",
    "",
    "## Overview",
    "",
    "GreenFleet combines manufacturer data, industry benchmarks and established calculation methods",
    "to estimate the environmental and financial impact of IT fleet decisions.",
    "",
    "All estimates carry uncertainty. This document lists every assumption, source and limitation.",
    "",
    "## Confidence Levels",
    "",
    "| Level | Description | Typical Variance |",
    "|-------|-------------|------------------|",
  ];
  for (const level of CONFIDENCE_LEVELS) {
    lines.push(`| **${level}** | ${CONFIDENCE_DESCRIPTIONS[level]} | ±${Math.round(CONFIDENCE_VARIANCE[level] * 100)}% |`);
  }

  lines.push("", "## Key Assumptions", "");
  for (const a of Object.values(ref.methodology.assumptions)) {
    lines.push(`### ${a.name}`);
    lines.push(`- **Value**: ${a.value} ${a.unit}`);
    lines.push(`- **Source**: ${a.source}`);
    lines.push(`- **Confidence**: ${a.confidence}`);
    if (hasExplicitRange(a)) lines.push(`- **Range**: ${a.rangeLow} - ${a.rangeHigh} ${a.unit}`);
    if (a.notes) lines.push(`- **Notes**: ${a.notes}`);
    lines.push("");
  }

  lines.push("## Calculation Methods", "");
  for (const m of Object.values(ref.methodology.methods)) {
    lines.push(`### ${m.name}`, "", `**Formula**: \`${m.formula}\``, "", m.description, "");
    lines.push(`**Confidence**: ${m.confidence}`, "", "**Limitations**:");
    for (const l of m.limitations) lines.push(`- ${l}`);
    lines.push("", `**Validation Status**: ${m.validationStatus}`, "");
  }

  lines.push("## Disclaimers", "");
  for (const text of Object.values(DISCLAIMERS)) lines.push(text, "");

  return lines.join("\n");
}

/** One line per calculation method, limited to the PDF standard-font character set. */
export function reportMethodologyNotes(ref: ReferenceData = loadReferenceData()): string[] {
  return Object.values(ref.methodology.methods).map(m =>
    `${m.name}: ${m.formula} (confidence: ${m.confidence})`.replace(/₂/g, "2"),
  );
}

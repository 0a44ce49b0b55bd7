/**
 * carbon-factor-loader.ts — Manufacturing emission factors per equipment type
 *
 * Sources, in the order the ROI endpoint tries them:
 *   1. Base Carbone style export ("poste", "valeur" columns), matched on label keywords
 *   2. Two-column "equipment_type, mfg_kgco2e" file
 *   3. equipment_carbon.json reference table
 */

import { findColumn, parseCsvTable, parseNumber } from "@/lib/csv/csv-parser";
import { loadReferenceData } from "@/lib/registry/readReferenceData";
import type { ReferenceData } from "@/lib/types/reference";

/** Label keyword → equipment type. First match wins per row. */
const LABEL_KEYWORDS: Array<[string[], string]> = [
  [["ordinateur portable"], "Laptop"],
  [["smartphone"], "Smartphone"],
  [["écran", "ecran"], "Screen"],
  [["tablette"], "Tablet"],
  [["routeur", "switch"], "Switch/Router"],
];

export function equipmentTypeForLabel(label: string): string | null {
  const lower = label.toLowerCase();
  for (const [keywords, type] of LABEL_KEYWORDS) {
    if (keywords.some(k => lower.includes(k))) return type;
  }
  return null;
}

/** Later rows override earlier ones for the same equipment type. */
export function loadCarbonFactors(content: string): Record<string, number> {
  const factors: Record<string, number> = {};
  const table = parseCsvTable(content);
  if (!table) return factors;

  const labelIdx = findColumn(table.header, ["poste"]);
  const valueIdx = findColumn(table.header, ["valeur"]);
  if (labelIdx < 0 || valueIdx < 0) return factors;

  for (const cols of table.rows) {
    const value = parseNumber(cols[valueIdx]);
    if (value === null) continue;
    const type = equipmentTypeForLabel(cols[labelIdx] ?? "");
    if (type) factors[type] = value;
  }
  return factors;
}

export function loadEquipmentFactors(content: string): Record<string, number> {
  const factors: Record<string, number> = {};
  const table = parseCsvTable(content);
  if (!table) return factors;

  const typeIdx = findColumn(table.header, ["equipment_type"]);
  const valueIdx = findColumn(table.header, ["mfg_kgco2e"]);
  if (typeIdx < 0 || valueIdx < 0) return factors;

  for (const cols of table.rows) {
    const type = cols[typeIdx];
    const value = parseNumber(cols[valueIdx]);
    if (type && value !== null) factors[type] = value;
  }
  return factors;
}

export function referenceCarbonFactors(ref: ReferenceData = loadReferenceData()): Record<string, number> {
  const factors: Record<string, number> = {};
  for (const [type, eq] of Object.entries(ref.equipmentCarbon)) factors[type] = eq.mfgKgco2e;
  return factors;
}

/** Detect the file layout and parse with the matching loader. */
export function parseCarbonFactorCsv(content: string): Record<string, number> {
  const table = parseCsvTable(content);
  if (!table) return {};
  if (findColumn(table.header, ["poste"]) >= 0) return loadCarbonFactors(content);
  return loadEquipmentFactors(content);
}

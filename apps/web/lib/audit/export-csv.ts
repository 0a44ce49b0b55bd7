/**
 * export-csv.ts — DeviceAnalysis[] → CSV text
 */

import type { DeviceAnalysis } from "@/lib/types/audit";

const COLUMNS: Array<[string, (a: DeviceAnalysis) => string | number | null]> = [
  ["Device_Model", a => a.deviceName],
  ["Age_Years", a => a.ageYears],
  ["Persona", a => a.persona],
  ["Country", a => a.country],
  ["Business_Unit", a => a.businessUnit],
  ["Recommendation", a => a.recommendation],
  ["Urgency", a => a.urgency],
  ["Urgency_Score", a => a.urgencyScore],
  ["TCO_Keep_EUR", a => a.tcoKeep],
  ["TCO_New_EUR", a => a.tcoNew],
  ["TCO_Refurb_EUR", a => a.tcoRefurb],
  ["Annual_Savings_EUR", a => a.annualSavings],
  ["CO2_Keep_KG", a => a.co2Keep],
  ["CO2_New_KG", a => a.co2New],
  ["CO2_Refurb_KG", a => a.co2Refurb],
  ["CO2_Savings_KG", a => a.co2Savings],
  ["Residual_Value_EUR", a => a.residualValue],
  ["Rationale", a => a.rationale],
];

export function escapeCsvField(value: string | number | null): string {
  if (value === null) return "";
  const s = String(value);
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function fleetAnalysesToCsv(analyses: DeviceAnalysis[]): string {
  const lines = [COLUMNS.map(([name]) => name).join(",")];
  for (const a of analyses) {
    lines.push(COLUMNS.map(([, get]) => escapeCsvField(get(a))).join(","));
  }
  return lines.join("\n") + "\n";
}

/**
 * fleet-parser.ts — Fleet inventory CSV → FleetRow[]
 *
 * Expected columns (header names are matched case-insensitively, spaces and
 * underscores are interchangeable):
 *   Device_Model, Age_Years, Persona, Country, Business_Unit
 *
 * Only Device_Model is required. Missing or invalid ages default to 3 years
 * and are reported as warnings.
 */

import { findColumn, parseCsvTable, parseNumber } from "@/lib/csv/csv-parser";
import type { FleetParseResult, FleetRow } from "@/lib/types/audit";

export const DEFAULT_AGE_YEARS = 3;
export const DEFAULT_COUNTRY = "FR";

const COLUMNS = {
  deviceModel: ["Device_Model", "Device", "Model"],
  ageYears: ["Age_Years", "Age"],
  persona: ["Persona", "Role"],
  country: ["Country", "Country_Code"],
  businessUnit: ["Business_Unit", "Unit", "Department"],
};

export function parseFleetCsv(content: string): FleetParseResult {
  const warnings: string[] = [];
  const table = parseCsvTable(content);

  if (!table) {
    return { rows: [], rowCount: 0, warnings, errors: ["CSV is empty"] };
  }

  const deviceIdx = findColumn(table.header, COLUMNS.deviceModel);
  if (deviceIdx < 0) {
    return { rows: [], rowCount: 0, warnings, errors: ["Missing required column: Device_Model"] };
  }
  const ageIdx = findColumn(table.header, COLUMNS.ageYears);
  const personaIdx = findColumn(table.header, COLUMNS.persona);
  const countryIdx = findColumn(table.header, COLUMNS.country);
  const unitIdx = findColumn(table.header, COLUMNS.businessUnit);

  if (ageIdx < 0) warnings.push(`No Age_Years column: all devices assumed ${DEFAULT_AGE_YEARS} years old`);

  const rows: FleetRow[] = [];
  table.rows.forEach((cols, i) => {
    const lineNo = i + 2;
    const deviceModel = cols[deviceIdx] ?? "";
    if (!deviceModel) {
      warnings.push(`Row ${lineNo}: empty Device_Model, skipped`);
      return;
    }

    let ageYears = DEFAULT_AGE_YEARS;
    if (ageIdx >= 0) {
      const age = parseNumber(cols[ageIdx]);
      if (age === null || age < 0) {
        warnings.push(`Row ${lineNo}: invalid age "${cols[ageIdx] ?? ""}", using ${DEFAULT_AGE_YEARS}`);
      } else {
        ageYears = age;
      }
    }

    rows.push({
      deviceModel,
      ageYears,
      persona: personaIdx >= 0 ? cols[personaIdx] ?? "" : "",
      country: (countryIdx >= 0 ? cols[countryIdx] : "") || DEFAULT_COUNTRY,
      businessUnit: unitIdx >= 0 ? cols[unitIdx] ?? "" : "",
    });
  });

  return { rows, rowCount: rows.length, warnings, errors: [] };
}

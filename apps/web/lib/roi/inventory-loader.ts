/**
 * inventory-loader.ts — Environmental ROI inventory files
 *
 *   loadInventory      "Category,Item,Value" → inventory / lifespan / price maps
 *   parseRoiInventory  "equipment_type,annual_salary,Category" → Inventory rows
 *
 * Both tolerate exports where each line is wrapped in one pair of quotes.
 */

import { findColumn, parseCsvTable, parseNumber } from "@/lib/csv/csv-parser";
import type { InventoryTables, RoiInventoryRow } from "@/lib/types/roi";

export function loadInventory(content: string): InventoryTables {
  const tables: InventoryTables = { inventory: {}, lifespan: {}, price: {} };
  const table = parseCsvTable(content);
  if (!table) return tables;

  const catIdx = findColumn(table.header, ["Category"]);
  const itemIdx = findColumn(table.header, ["Item"]);
  const valueIdx = findColumn(table.header, ["Value"]);
  if (catIdx < 0 || itemIdx < 0 || valueIdx < 0) return tables;

  for (const cols of table.rows) {
    const item = cols[itemIdx];
    const value = parseNumber(cols[valueIdx]);
    if (!item || value === null) continue;

    switch (cols[catIdx]) {
      case "Inventory":
        tables.inventory[item] = value;
        break;
      case "Lifespan":
        tables.lifespan[item] = value;
        break;
      case "Price":
        tables.price[item] = value;
        break;
    }
  }
  return tables;
}

/** Rows with Category == Inventory; a non-numeric salary counts as 0. */
export function parseRoiInventory(content: string): RoiInventoryRow[] {
  const table = parseCsvTable(content);
  if (!table) return [];

  const typeIdx = findColumn(table.header, ["equipment_type"]);
  const salaryIdx = findColumn(table.header, ["annual_salary"]);
  const catIdx = findColumn(table.header, ["Category"]);
  if (typeIdx < 0) return [];

  const rows: RoiInventoryRow[] = [];
  for (const cols of table.rows) {
    if (catIdx >= 0 && (cols[catIdx] ?? "") !== "Inventory") continue;
    const equipmentType = cols[typeIdx] ?? "";
    if (!equipmentType) continue;
    rows.push({
      equipmentType,
      annualSalary: salaryIdx >= 0 ? parseNumber(cols[salaryIdx]) ?? 0 : 0,
    });
  }
  return rows;
}

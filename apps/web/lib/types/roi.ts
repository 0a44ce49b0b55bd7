/** Environmental ROI inventory row (equipment_type, annual_salary) */
export interface RoiInventoryRow {
  equipmentType: string;
  annualSalary: number;
}

export interface RoiResult {
  equipment: string;
  co2SavedKg: number;
  carbonValueEur: number;
  lagCostEur: number;
  netRoiEur: number;
}

/** Row result after the carbon-factor join; carbon fields are null when unmatched. */
export interface RoiJoinedRow {
  equipment: string;
  mfgKgco2e: number | null;
  co2SavedKg: number | null;
  carbonValueEur: number | null;
  lagCostEur: number;
  netRoiEur: number | null;
}

export interface EnvironmentalRoiReport {
  rows: RoiJoinedRow[];
  warnings: string[];
  totalNetRoiEur: number;
  carbonPriceEurPerTonne: number;
}

export interface InventoryTables {
  inventory: Record<string, number>;
  lifespan: Record<string, number>;   // months
  price: Record<string, number>;      // €
}

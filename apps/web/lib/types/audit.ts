import type { UrgencyLevel } from "./reference";

export type OptimizationGoal = "balanced" | "cost_first" | "eco_first";
export type Recommendation = "KEEP" | "NEW" | "REFURBISHED";

export interface TcoBreakdown {
  energy?: number;
  productivityLoss?: number;
  residualLoss?: number;
  purchase?: number;
  disposal?: number;
  residualBenefit?: number;
}

export interface TcoResult {
  total: number;                 // € / year, Infinity when unavailable
  breakdown: TcoBreakdown;
  productivityLossPct?: number;
  available: boolean;
}

export interface Co2Result {
  total: number;                 // kg CO2e / year, Infinity when unavailable
  breakdown: { manufacturing?: number; usage?: number };
  available: boolean;
}

export interface UrgencyResult {
  score: number;
  level: UrgencyLevel;
  rationale: string;
}

export interface DeviceAuditInput {
  deviceName: string;
  ageYears: number;
  persona: string;
  country: string;
  goal?: OptimizationGoal;
  /** kg CO2/kWh from a live source, replaces the table factor */
  gridFactorOverride?: number;
}

export interface DeviceAnalysis {
  deviceName: string;
  ageYears: number;
  persona: string;
  country: string;
  recommendation: Recommendation;
  urgency: UrgencyLevel;
  urgencyScore: number;
  urgencyRationale: string;
  tcoKeep: number;
  tcoNew: number;
  tcoRefurb: number | null;
  residualValue: number;
  annualSavings: number;
  co2Keep: number;
  co2New: number;
  co2Refurb: number | null;
  co2Savings: number;
  productivityLossPct: number;
  energyCostAnnual: number;
  scores: Partial<Record<Recommendation, number>>;
  rationale: string;
  businessUnit: string;
}

export interface FleetRow {
  deviceModel: string;
  ageYears: number;
  persona: string;
  country: string;
  businessUnit: string;
}

export interface FleetParseResult {
  rows: FleetRow[];
  rowCount: number;
  warnings: string[];
  errors: string[];
}

export interface BusinessUnitSummary {
  count: number;
  savings: number;
  co2: number;
  highUrgency: number;
}

export interface FleetSummary {
  totalDevices: number;
  byRecommendation: Record<Recommendation, number>;
  byUrgency: Record<UrgencyLevel, number>;
  totalAnnualSavingsEur: number;
  totalCo2SavingsKg: number;
  totalRecoverableValueEur: number;
  averageAgeYears: number;
  byBusinessUnit: Record<string, BusinessUnitSummary>;
}

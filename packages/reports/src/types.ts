/**
 * Report input. Structural subset of the fleet analysis output, so any
 * analysis row or summary from the audit engine can be passed as is.
 */

export interface ReportDeviceRow {
  deviceName: string;
  ageYears: number;
  persona: string;
  businessUnit: string;
  recommendation: string;
  urgency: string;
  annualSavings: number;
  co2Savings: number;
  residualValue: number;
}

export interface ReportUnitSummary {
  count: number;
  savings: number;
  co2: number;
  highUrgency: number;
}

export interface ReportSummary {
  totalDevices: number;
  byRecommendation: Record<string, number>;
  byUrgency: Record<string, number>;
  totalAnnualSavingsEur: number;
  totalCo2SavingsKg: number;
  totalRecoverableValueEur: number;
  averageAgeYears: number;
  byBusinessUnit: Record<string, ReportUnitSummary>;
}

export interface FleetReportInput {
  title?: string;
  goal: string;
  /** Fixed for reproducible output; defaults to now */
  generatedAt?: Date;
  summary: ReportSummary;
  devices: ReportDeviceRow[];
  /** Lines printed under "Methodology" */
  methodologyNotes: string[];
  disclaimer: string;
}

export interface FleetReportPdf {
  buffer: Buffer;
  pdf_hash: string;
  pages: number;
}

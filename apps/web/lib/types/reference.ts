/** Audit device catalogue entry (data/reference/devices.json) */
export interface DeviceSpec {
  priceNewEur: number;
  co2ManufacturingKg: number;
  powerKw: number;
  lifespanMonths: number;
  category: string;
  refurbAvailable: boolean;
  hasData: boolean;
  isRefurbished?: boolean;
  source: string;
}

export interface PersonaSpec {
  description: string;
  salaryEur: number;
  dailyHours: number;
  lagSensitivity: number;
  typicalDevice: string;
}

export interface GridFactor {
  factor: number;       // kg CO2 / kWh
  name: string;
}

export type UrgencyLevel = "HIGH" | "MEDIUM" | "LOW";

export interface LifecycleRules {
  energy: {
    priceKwhEur: number;
    priceSource: string;
    workingDaysPerYear: number;
    legalHoursAnnual: number;
    hoursSource: string;
  };
  disposal: {
    costWithDataEur: number;
    costNoDataEur: number;
    source: string;
  };
  depreciation: {
    curve: Record<string, number>;
    floorRate: number;
    premiumKeywords: string[];
    premiumRetentionBonus: number;
    source: string;
  };
  productivity: {
    optimalYears: number;
    degradationPerYear: number;
    maxDegradation: number;
    source: string;
  };
  refurb: {
    co2ReductionFactor: number;
    priceDiscountFactor: number;
    energyPenaltyFactor: number;
    warrantyYears: number;
    residualShare: number;
    equivalentAgeYears: number;
    source: string;
  };
  urgency: {
    ageCriticalYears: number;
    ageHighYears: number;
    performanceThreshold: number;
    eolThresholdMonths: number;
    thresholds: Record<UrgencyLevel, number>;
    source: string;
  };
  fleet: {
    defaultRefreshYears: number;
    defaultTargetReduction: number;
  };
}

export interface StrategySpec {
  name: string;
  description: string;
  refreshYears: number;
  refurbRate: number;
  recoveryRate: number;
  implementationCostFactor: number;
}

export interface BusinessUnit {
  category: string;
  estimatedFleetSize: number;
  estimatedAvgAgeYears: number;
  primaryRegions: string[];
}

/** Lifecycle optimizer tables (data/reference/simulator.json) */
export interface SimulatorAsset {
  price: number;
  priceRefurb: number;
  prodCo2: number;       // kg CO2e manufacturing
  energy: number;        // kWh / year
  life: number;          // years
}

export interface SimulatorPersona {
  salary: number;        // € / hour
  sensitivity: number;
  description: string;
}

export interface SimulatorRules {
  carbonPrice: number;
  lifeFactor: number;
  energyPenalty: number;
  keepEnergyPenalty: number;
  lagNewTrigger: number;
  lagRefurbTrigger: number;
  lagHoursPerYear: number;
  gridFactor: number;
  refurbProdDebt: number;
  weightMultiplier: number;
}

export interface SimulatorTables {
  fallbackAsset: string;
  fallbackPersona: string;
  assets: Record<string, SimulatorAsset>;
  personas: Record<string, SimulatorPersona>;
  rules: SimulatorRules;
}

/** Environmental-ROI equipment constants (data/reference/equipment_carbon.json) */
export interface EquipmentCarbon {
  priceNew: number;
  lifespanMonths: number;
  mfgKgco2e: number;
  powerKw: number;
}

export interface CloudStorageOffer {
  provider: string;
  service: string;
  storageClass: string;
  region: string;
  priceEurTbMonth: number;
  co2KgTbMonth: number;
  intensity: string;
}

/** Methodology tables (data/reference/methodology.json) */
export type ConfidenceLevel = "HIGH" | "MEDIUM" | "LOW" | "THEORETICAL";

export interface Assumption {
  name: string;
  value: number | string;
  unit: string;
  source: string;
  sourceUrl: string | null;
  confidence: ConfidenceLevel;
  notes?: string;
  rangeLow?: number;
  rangeHigh?: number;
}

export interface CalculationMethod {
  name: string;
  formula: string;
  description: string;
  inputs: string[];
  assumptions: string[];       // keys into MethodologyTables.assumptions
  confidence: ConfidenceLevel;
  limitations: string[];
  validationStatus: string;
}

export interface MethodologyTables {
  assumptions: Record<string, Assumption>;
  methods: Record<string, CalculationMethod>;
}

export interface ReferenceData {
  devices: Record<string, DeviceSpec>;
  fallbackDevice: string;
  personas: Record<string, PersonaSpec>;
  fallbackPersona: string;
  gridFactors: Record<string, GridFactor>;
  defaultGridFactor: number;
  rules: LifecycleRules;
  strategies: Record<string, StrategySpec>;
  businessUnits: Record<string, BusinessUnit>;
  simulator: SimulatorTables;
  equipmentCarbon: Record<string, EquipmentCarbon>;
  cloudOffers: CloudStorageOffer[];
  methodology: MethodologyTables;
  sources: Record<string, string>;
}

/** Response: /api/registry/reference */
export interface ReferenceRegistryResponse {
  devices: string[];
  personas: string[];
  countries: Record<string, string>;
  strategies: Array<{ key: string; name: string; description: string }>;
  businessUnits: string[];
  simulator: { assets: string[]; personas: string[] };
  cloudProviders: string[];
  sources: Record<string, string>;
}

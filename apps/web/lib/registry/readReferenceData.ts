/**
 * Reference data reader.
 *
 * Loads the static lookup tables from data/reference/*.json once per process.
 * All tables are read-only; lookups with an unknown key resolve to the
 * documented fallback entry of their table.
 */

import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import { getProjectRoot } from "@/lib/project-root";
import type {
  BusinessUnit,
  CloudStorageOffer,
  DeviceSpec,
  EquipmentCarbon,
  GridFactor,
  LifecycleRules,
  MethodologyTables,
  PersonaSpec,
  ReferenceData,
  SimulatorTables,
  StrategySpec,
} from "@/lib/types/reference";

const REFERENCE_DIR = resolve(getProjectRoot(), "data", "reference");

interface DevicesFile { source: string; fallback: string; devices: Record<string, DeviceSpec> }
interface PersonasFile { source: string; fallback: string; personas: Record<string, PersonaSpec> }
interface GridFile { source: string; defaultFactor: number; countries: Record<string, GridFactor> }
interface StrategiesFile { source: string; strategies: Record<string, StrategySpec> }
interface BusinessUnitsFile { source: string; disclaimer: string; units: Record<string, BusinessUnit> }
interface EquipmentFile { source: string; equipment: Record<string, EquipmentCarbon> }
interface CloudFile { source: string; offers: CloudStorageOffer[] }

function readTable<T extends object>(file: string, requiredKey: string): T {
  const path = resolve(REFERENCE_DIR, file);
  if (!existsSync(path)) {
    throw new Error(`[registry] reference table not found: ${path}`);
  }
  const table: T = JSON.parse(readFileSync(path, "utf-8"));
  if (typeof table !== "object" || table === null || !(requiredKey in table)) {
    throw new Error(`[registry] ${file} is missing "${requiredKey}"`);
  }
  return table;
}

let _cache: ReferenceData | null = null;

export function loadReferenceData(): ReferenceData {
  if (_cache) return _cache;

  const devices = readTable<DevicesFile>("devices.json", "devices");
  const personas = readTable<PersonasFile>("personas.json", "personas");
  const grid = readTable<GridFile>("grid_factors.json", "countries");
  const rules = readTable<LifecycleRules>("lifecycle_rules.json", "depreciation");
  const strategies = readTable<StrategiesFile>("strategies.json", "strategies");
  const units = readTable<BusinessUnitsFile>("business_units.json", "units");
  const simulator = readTable<SimulatorTables>("simulator.json", "assets");
  const equipment = readTable<EquipmentFile>("equipment_carbon.json", "equipment");
  const cloud = readTable<CloudFile>("cloud_storage.json", "offers");
  const methodology = readTable<MethodologyTables>("methodology.json", "assumptions");

  _cache = {
    devices: devices.devices,
    fallbackDevice: devices.fallback,
    personas: personas.personas,
    fallbackPersona: personas.fallback,
    gridFactors: grid.countries,
    defaultGridFactor: grid.defaultFactor,
    rules,
    strategies: strategies.strategies,
    businessUnits: units.units,
    simulator,
    equipmentCarbon: equipment.equipment,
    cloudOffers: cloud.offers,
    methodology,
    sources: {
      "Working Hours": rules.energy.hoursSource,
      "Electricity Price": rules.energy.priceSource,
      "Personas": personas.source,
      "Devices": devices.source,
      "Disposal Costs": rules.disposal.source,
      "Depreciation": rules.depreciation.source,
      "Productivity": rules.productivity.source,
      "Refurbished": rules.refurb.source,
      "Urgency": rules.urgency.source,
      "Grid Factors": grid.source,
      "Business Units": units.source,
      "Strategies": strategies.source,
      "Equipment Carbon": equipment.source,
      "Cloud Storage": cloud.source,
    },
  };
  return _cache;
}

// ─── Lookups ──────────────────────────────────────────────────────────────────

/** Resolve a device name, falling back to the default device. */
export function resolveDeviceName(name: string | undefined, ref: ReferenceData = loadReferenceData()): string {
  return name !== undefined && name in ref.devices ? name : ref.fallbackDevice;
}

export function resolvePersonaName(name: string | undefined, ref: ReferenceData = loadReferenceData()): string {
  return name !== undefined && name in ref.personas ? name : ref.fallbackPersona;
}

export function getDevice(name: string | undefined, ref: ReferenceData = loadReferenceData()): DeviceSpec {
  return ref.devices[resolveDeviceName(name, ref)];
}

export function getPersona(name: string | undefined, ref: ReferenceData = loadReferenceData()): PersonaSpec {
  return ref.personas[resolvePersonaName(name, ref)];
}

/** kg CO2/kWh for a country code; unknown codes get the default factor. */
export function getGridFactor(country: string, ref: ReferenceData = loadReferenceData()): number {
  return ref.gridFactors[country.toUpperCase()]?.factor ?? ref.defaultGridFactor;
}

/** Depreciation rate for a given age, truncated to whole years and capped at 8. */
export function getDepreciationRate(ageYears: number, ref: ReferenceData = loadReferenceData()): number {
  const bucket = Math.floor(Math.min(ageYears, 8));
  const { curve, floorRate } = ref.rules.depreciation;
  return curve[String(bucket)] ?? floorRate;
}

export function isPremiumDevice(name: string, ref: ReferenceData = loadReferenceData()): boolean {
  return ref.rules.depreciation.premiumKeywords.some(kw => name.includes(kw));
}

/** Data-bearing devices need a wipe pass before disposal. */
export function getDisposalCost(name: string, ref: ReferenceData = loadReferenceData()): number {
  const hasData = ref.devices[name]?.hasData ?? true;
  return hasData ? ref.rules.disposal.costWithDataEur : ref.rules.disposal.costNoDataEur;
}

// ─── Lists ────────────────────────────────────────────────────────────────────

export function deviceNames(ref: ReferenceData = loadReferenceData()): string[] {
  return Object.keys(ref.devices);
}

export function personaNames(ref: ReferenceData = loadReferenceData()): string[] {
  return Object.keys(ref.personas);
}

export function countryCodes(ref: ReferenceData = loadReferenceData()): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [code, g] of Object.entries(ref.gridFactors)) out[code] = g.name;
  return out;
}

export function businessUnitNames(ref: ReferenceData = loadReferenceData()): string[] {
  return Object.keys(ref.businessUnits);
}

export function getAllSources(ref: ReferenceData = loadReferenceData()): Record<string, string> {
  return { ...ref.sources };
}

/**
 * GET /api/registry/reference
 *
 * Lookup lists for the audit forms: devices, personas, countries,
 * strategies, business units, simulator assets, cloud providers, sources.
 */

import { NextResponse } from "next/server";
import {
  businessUnitNames,
  countryCodes,
  deviceNames,
  getAllSources,
  loadReferenceData,
  personaNames,
} from "@/lib/registry/readReferenceData";
import { getCloudProviders } from "@/lib/cloud/storage-engine";
import { errorResponse } from "@/lib/api/route-errors";
import type { ReferenceRegistryResponse } from "@/lib/types/reference";

export async function GET() {
  try {
    const ref = loadReferenceData();
    const response: ReferenceRegistryResponse = {
      devices: deviceNames(ref),
      personas: personaNames(ref),
      countries: countryCodes(ref),
      strategies: Object.entries(ref.strategies).map(([key, s]) => ({ key, name: s.name, description: s.description })),
      businessUnits: businessUnitNames(ref),
      simulator: {
        assets: Object.keys(ref.simulator.assets),
        personas: Object.keys(ref.simulator.personas),
      },
      cloudProviders: getCloudProviders(ref),
      sources: getAllSources(ref),
    };
    return NextResponse.json(response);
  } catch (e) {
    return errorResponse("/api/registry/reference", e);
  }
}

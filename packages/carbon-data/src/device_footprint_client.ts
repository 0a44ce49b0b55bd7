/**
 * device_footprint_client.ts — Embedded (manufacturing) footprint per device
 *
 * GET {baseUrl}/v1/terminal/{archetype}?criteria=gwp
 * Response: { impacts: { gwp: { embedded: { value } } } }  (kg CO2e)
 */

import { errorResult, getJson, numberAt, trimBase } from "./http";
import type { CarbonDataClientConfig, CarbonDataResult } from "./types";

/** Fleet device category → terminal archetype */
export const TERMINAL_ARCHETYPES: Readonly<Record<string, string>> = {
  Laptop: "laptop",
  Workstation: "laptop",
  Smartphone: "smartphone",
  Tablet: "tab",
  Scanner: "smartphone",
  Monitor: "monitor",
  Display: "television",
  Network: "box",
};

export async function fetchDeviceFootprint(
  config: CarbonDataClientConfig,
  category: string,
): Promise<CarbonDataResult> {
  if (!config.baseUrl) {
    return errorResult("NOT_CONFIGURED", "Device footprint API URL is not set");
  }

  const archetype = TERMINAL_ARCHETYPES[category];
  if (!archetype) {
    return errorResult("UNKNOWN_CATEGORY", `No terminal archetype for category "${category}"`);
  }

  const url = `${trimBase(config.baseUrl)}/v1/terminal/${archetype}?criteria=gwp`;
  const res = await getJson(config, url);
  if (!res.ok) return res;

  const kg = numberAt(res.body, ["impacts", "gwp", "embedded", "value"]);
  if (kg === null || kg < 0) {
    return errorResult("BAD_PAYLOAD", `No embedded gwp value for ${archetype}`);
  }

  return {
    ok: true,
    value: kg,
    unit: "kgCO2e",
    source_url: url,
    fetched_at_utc: new Date().toISOString(),
  };
}

/**
 * grid_intensity_client.ts — Live grid carbon intensity
 *
 * GET {baseUrl}/carbon-intensity/latest?zone={CC}
 * Response: { zone, carbonIntensity (gCO2eq/kWh), datetime, ... }
 *
 * The value returned is kg CO2/kWh so it can replace a local grid factor
 * directly.
 */

import { errorResult, getJson, numberAt, trimBase } from "./http";
import type { CarbonDataClientConfig, CarbonDataResult } from "./types";

export async function fetchGridIntensity(
  config: CarbonDataClientConfig,
  country: string,
): Promise<CarbonDataResult> {
  if (!config.baseUrl) {
    return errorResult("NOT_CONFIGURED", "Grid intensity API URL is not set");
  }

  const zone = country.trim().toUpperCase();
  const params = new URLSearchParams({ zone });
  const url = `${trimBase(config.baseUrl)}/carbon-intensity/latest?${params.toString()}`;

  const res = await getJson(config, url);
  if (!res.ok) return res;

  const grams = numberAt(res.body, ["carbonIntensity"]);
  if (grams === null || grams < 0) {
    return errorResult("BAD_PAYLOAD", `No carbonIntensity for zone ${zone}`);
  }

  return {
    ok: true,
    value: grams / 1000,
    unit: "kgCO2/kWh",
    source_url: url,
    fetched_at_utc: new Date().toISOString(),
  };
}

/**
 * resolveGridFactor.ts — Live-or-table carbon factors
 *
 *   grid factor:  live intensity API → grid_factors.json → default factor
 *   device mfg:   live footprint API → devices.json co2ManufacturingKg
 *
 * With no API URL configured the table value is returned without a request.
 */

import {
  fetchDeviceFootprint,
  fetchGridIntensity,
  resolveWithFallback,
  type FetchLike,
  type ResolvedValue,
} from "@greenfleet/carbon-data";
import { getConfig, type AppConfig } from "@/lib/config";
import { getDevice, getGridFactor, loadReferenceData } from "@/lib/registry/readReferenceData";
import type { ReferenceData } from "@/lib/types/reference";

export interface ResolveOptions {
  config?: AppConfig;
  ref?: ReferenceData;
  fetchImpl?: FetchLike;
}

export async function resolveGridFactor(country: string, opts: ResolveOptions = {}): Promise<ResolvedValue> {
  const config = opts.config ?? getConfig();
  const ref = opts.ref ?? loadReferenceData();
  const fallback = getGridFactor(country, ref);

  if (!config.carbonIntensityApiUrl) return { value: fallback, source: "fallback" };

  const result = await fetchGridIntensity(
    {
      baseUrl: config.carbonIntensityApiUrl,
      token: config.carbonIntensityApiToken || undefined,
      timeoutMs: config.carbonDataTimeoutMs,
      fetchImpl: opts.fetchImpl,
    },
    country,
  );
  return resolveWithFallback(result, fallback);
}

export async function resolveDeviceFootprint(deviceName: string, opts: ResolveOptions = {}): Promise<ResolvedValue> {
  const config = opts.config ?? getConfig();
  const device = getDevice(deviceName, opts.ref ?? loadReferenceData());
  const fallback = device.co2ManufacturingKg;

  if (!config.deviceFootprintApiUrl) return { value: fallback, source: "fallback" };

  const result = await fetchDeviceFootprint(
    {
      baseUrl: config.deviceFootprintApiUrl,
      timeoutMs: config.carbonDataTimeoutMs,
      fetchImpl: opts.fetchImpl,
    },
    device.category,
  );
  return resolveWithFallback(result, fallback);
}

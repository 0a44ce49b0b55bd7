export { fetchGridIntensity } from "./grid_intensity_client";
export { fetchDeviceFootprint, TERMINAL_ARCHETYPES } from "./device_footprint_client";
export { resolveWithFallback, DEFAULT_TIMEOUT_MS } from "./http";
export type {
  CarbonDataClientConfig,
  CarbonDataResult,
  CarbonDataValue,
  CarbonDataError,
  CarbonDataErrorCode,
  FetchLike,
  ResolvedValue,
} from "./types";

import type { FetchLike } from "@greenfleet/carbon-data";
import type { AppConfig } from "@/lib/config";
import { resolveDeviceFootprint, resolveGridFactor } from "./resolveGridFactor";

const offline: AppConfig = {
  carbonIntensityApiUrl: "",
  carbonIntensityApiToken: "",
  deviceFootprintApiUrl: "",
  carbonDataTimeoutMs: 50,
  auditLogDir: "unused",
  auditLogEnabled: false,
  carbonPriceEurPerTonne: 80,
};

const live: AppConfig = {
  ...offline,
  carbonIntensityApiUrl: "https://grid.example.test",
  carbonIntensityApiToken: "test-secret",
  deviceFootprintApiUrl: "https://footprint.example.test",
};

function respond(status: number, body: unknown): FetchLike {
  return async () => ({ ok: status === 200, status, json: async () => body });
}

let warn: jest.SpyInstance;
beforeEach(() => {
  warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
});
afterEach(() => warn.mockRestore());

describe("resolveGridFactor", () => {
  test("no API configured → table factor, no request", async () => {
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
    expect(await resolveGridFactor("FR", { config: offline, fetchImpl })).toEqual({ value: 0.052, source: "fallback" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test("live value converted to kg/kWh", async () => {
    const res = await resolveGridFactor("FR", { config: live, fetchImpl: respond(200, { carbonIntensity: 32 }) });
    expect(res.source).toBe("api");
    expect(res.value).toBeCloseTo(0.032, 10);
  });

  test("API failure → table factor", async () => {
    expect(await resolveGridFactor("DE", { config: live, fetchImpl: respond(500, {}) })).toEqual({ value: 0.35, source: "fallback" });
  });

  test("unknown country falls back to the default factor", async () => {
    expect(await resolveGridFactor("ZZ", { config: offline })).toEqual({ value: 0.27, source: "fallback" });
  });
});

describe("resolveDeviceFootprint", () => {
  test("table value when offline", async () => {
    expect(await resolveDeviceFootprint("Workstation", { config: offline })).toEqual({ value: 450, source: "fallback" });
  });

  test("live embedded footprint", async () => {
    const body = { impacts: { gwp: { embedded: { value: 210 } } } };
    expect(await resolveDeviceFootprint("Tablet", { config: live, fetchImpl: respond(200, body) })).toEqual({ value: 210, source: "api" });
  });

  test("unknown device uses the fallback device", async () => {
    expect(await resolveDeviceFootprint("Toaster", { config: offline })).toEqual({ value: 250, source: "fallback" });
  });
});

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { loadConfig, parseEnvFile } from "./config";

describe("parseEnvFile", () => {
  test("skips comments and strips quotes", () => {
    const env = parseEnvFile('# live data\nCARBON_INTENSITY_API_URL="https://grid.example.test"\n\nAUDIT_LOG_ENABLED=false\r\nnot a pair\n');
    expect(env).toEqual({
      CARBON_INTENSITY_API_URL: "https://grid.example.test",
      AUDIT_LOG_ENABLED: "false",
    });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "greenfleet-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("defaults when nothing is set", () => {
    const config = loadConfig({}, join(dir, "missing.env"));
    expect(config).toEqual({
      carbonIntensityApiUrl: "",
      carbonIntensityApiToken: "",
      deviceFootprintApiUrl: "",
      carbonDataTimeoutMs: 3000,
      auditLogDir: resolve(process.cwd(), "data", "audit_logs"),
      auditLogEnabled: true,
      carbonPriceEurPerTonne: 80,
    });
  });

  test("process env wins over the env file", () => {
    const file = join(dir, ".env.local");
    writeFileSync(file, "CARBON_INTENSITY_API_TOKEN=file-token\nCARBON_DATA_TIMEOUT_MS=5000\n");
    const config = loadConfig({ CARBON_INTENSITY_API_TOKEN: "test-secret" }, file);
    expect(config.carbonIntensityApiToken).toBe("test-secret");
    expect(config.carbonDataTimeoutMs).toBe(5000);
  });

  test("invalid numbers fall back", () => {
    const config = loadConfig({ CARBON_DATA_TIMEOUT_MS: "soon", CARBON_PRICE_EUR_PER_TONNE: "-3" }, join(dir, "none"));
    expect(config.carbonDataTimeoutMs).toBe(3000);
    expect(config.carbonPriceEurPerTonne).toBe(80);
  });

  test("audit log can be switched off", () => {
    expect(loadConfig({ AUDIT_LOG_ENABLED: "off" }, join(dir, "none")).auditLogEnabled).toBe(false);
    expect(loadConfig({ AUDIT_LOG_ENABLED: "1" }, join(dir, "none")).auditLogEnabled).toBe(true);
  });
});

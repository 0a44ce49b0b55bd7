import { resolve } from "path";
import { parseArgs } from "./fleet_audit_report";

describe("fleet_audit_report parseArgs", () => {
  test("defaults", () => {
    const args = parseArgs([]);
    expect(args).toMatchObject({ input: "", demo: 50, seed: 42, goal: "balanced", formats: ["csv", "pdf"] });
    expect(args.outDir).toBe(resolve(__dirname, "..", "reports"));
  });

  test("reads every option", () => {
    const args = parseArgs(["--demo", "200", "--seed", "7", "--goal", "eco_first", "--format", "PDF", "--out-dir", "out"]);
    expect(args).toMatchObject({ demo: 200, seed: 7, goal: "eco_first", formats: ["pdf"], outDir: resolve("out") });
  });

  test("a trailing flag without a value is an error", () => {
    expect(() => parseArgs(["--demo", "10", "--seed"])).toThrow("--seed needs a value");
  });

  test("a flag followed by another flag is an error", () => {
    expect(() => parseArgs(["--input", "--goal", "balanced"])).toThrow("--input needs a value");
  });

  test("unknown options and goals are rejected", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseArgs(["--goal", "fastest"])).toThrow("Invalid goal: fastest. Valid: balanced, cost_first, eco_first");
  });
});

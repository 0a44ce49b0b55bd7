/**
 * recommendation-engine.test.ts — Scenario selection
 *
 * Laptop (Standard), 4 years, Admin Normal (HR/Finance), FR:
 *   TCO  keep 1761.62 | new 90.12 | refurb 239.78
 *   CO2  keep 2.75    | new 65.25 | refurb 21.78
 */

import { analyzeDevice, argmin, scoreOptions } from "./recommendation-engine";

const BASE = {
  deviceName: "Laptop (Standard)",
  ageYears: 4,
  persona: "Admin Normal (HR/Finance)",
  country: "FR",
};

describe("argmin", () => {
  test("first key wins a tie", () => {
    const scores = new Map([["KEEP", 1], ["NEW", 1], ["REFURBISHED", 2]]);
    expect(argmin(scores)).toBe("KEEP");
  });

  test("empty score set throws", () => {
    expect(() => argmin(new Map<string, number>())).toThrow();
  });
});

describe("scoreOptions", () => {
  test("balanced normalizes both axes", () => {
    const scores = scoreOptions(
      [
        { option: "KEEP", tco: 100, co2: 10 },
        { option: "NEW", tco: 50, co2: 20 },
      ],
      "balanced",
    );
    expect(scores.get("KEEP")).toBe(0.75);
    expect(scores.get("NEW")).toBe(0.75);
  });

  test("zero maxima do not divide by zero", () => {
    const scores = scoreOptions([{ option: "KEEP", tco: 0, co2: 0 }], "balanced");
    expect(scores.get("KEEP")).toBe(0);
  });
});

describe("analyzeDevice", () => {
  test("balanced goal picks refurbished", () => {
    const a = analyzeDevice(BASE);
    expect(a.recommendation).toBe("REFURBISHED");
    expect(a.tcoKeep).toBe(1761.62);
    expect(a.tcoNew).toBe(90.12);
    expect(a.tcoRefurb).toBe(239.78);
    expect(a.co2Refurb).toBe(21.78);
    expect(a.urgency).toBe("MEDIUM");
    expect(a.urgencyScore).toBe(1.8);
    expect(a.residualValue).toBe(200);
    expect(a.annualSavings).toBeCloseTo(1671.5, 2);
    expect(a.co2Savings).toBe(0);
    expect(a.energyCostAnnual).toBe(11.62);
    expect(a.productivityLossPct).toBe(0.03);
    expect(a.rationale).toBe(
      "Best value: saves €1522/year and 43.5kg CO2 vs new. Current device recoverable value: €200",
    );
  });

  test("cost_first picks the cheapest option", () => {
    const a = analyzeDevice({ ...BASE, goal: "cost_first" });
    expect(a.recommendation).toBe("NEW");
    expect(a.rationale).toBe(
      "New device recommended for optimal performance and reliability. Current device recoverable value: €200",
    );
  });

  test("eco_first keeps the device", () => {
    const a = analyzeDevice({ ...BASE, goal: "eco_first" });
    expect(a.recommendation).toBe("KEEP");
    expect(a.rationale).toBe("Cost-effective to maintain. Annual TCO: €1762");
  });

  test("HIGH urgency overrides KEEP", () => {
    const a = analyzeDevice({ ...BASE, ageYears: 6, goal: "eco_first" });
    expect(a.urgency).toBe("HIGH");
    expect(a.recommendation).toBe("REFURBISHED");
    expect(a.rationale).toBe("High urgency: device requires replacement due to age/performance");
  });

  test("unknown device and persona resolve to fallbacks", () => {
    const a = analyzeDevice({ ...BASE, deviceName: "Abacus", persona: "Astronaut" });
    expect(a.deviceName).toBe("Laptop (Standard)");
    expect(a.persona).toBe("Admin Normal (HR/Finance)");
    expect(a.tcoKeep).toBe(1761.62);
  });

  test("unknown country uses the default grid factor", () => {
    const a = analyzeDevice({ ...BASE, country: "ZZ" });
    expect(a.co2Keep).toBe(14.26);
    expect(a.rationale).toBe(
      "Best value: saves €1522/year and 42.3kg CO2 vs new. Current device recoverable value: €200",
    );
  });

  test("no refurbished option when the market has none", () => {
    const a = analyzeDevice({ ...BASE, deviceName: "iPhone 16e (New Target)" });
    expect(a.tcoRefurb).toBeNull();
    expect(a.co2Refurb).toBeNull();
    expect(a.scores.REFURBISHED).toBeUndefined();
  });
});

/**
 * growth-projection.test.ts
 *
 * 150 laptops, +10 %/yr over 3 years, Laptop (Standard): 250 kg, €1000.
 */

import { projectGrowth } from "./growth-projection";

const BASE = { currentDevices: 150, annualGrowthPct: 10, years: 3 };

describe("projectGrowth", () => {
  test("buying new", () => {
    const p = projectGrowth({ ...BASE, procurement: "new" });
    expect(p.deviceName).toBe("Laptop (Standard)");
    expect(p.newDevicesNeeded).toBe(49);
    expect(p.co2Kg).toBe(12412.5);
    expect(p.co2Tonnes).toBe(12.41);
    expect(p.budgetEur).toBe(49650);
    expect(p.co2AvoidedKg).toBe(0);
  });

  test("refurbished purchases cut CO2 by 40 % and cost by 30 %", () => {
    const p = projectGrowth({ ...BASE, procurement: "refurbished" });
    expect(p.co2Kg).toBe(7447.5);
    expect(p.co2Tonnes).toBe(7.45);
    expect(p.budgetEur).toBe(34755);
    expect(p.co2AvoidedKg).toBe(4965);
  });

  test("one row per year", () => {
    const p = projectGrowth({ ...BASE, procurement: "new" });
    expect(p.years.map(y => y.year)).toEqual([1, 2, 3]);
    expect(p.years.map(y => y.fleetSize)).toEqual([165, 181.5, 199.65]);
    expect(p.years.map(y => y.newDevices)).toEqual([15, 31, 49]);
    expect(p.years[0].co2Kg).toBe(3750);
    expect(p.years[1].budgetEur).toBe(31500);
  });

  test("no growth needs no devices", () => {
    const p = projectGrowth({ ...BASE, annualGrowthPct: 0, procurement: "new" });
    expect(p.newDevicesNeeded).toBe(0);
    expect(p.co2Kg).toBe(0);
    expect(p.budgetEur).toBe(0);
  });

  test("unknown device falls back", () => {
    expect(projectGrowth({ ...BASE, procurement: "new", deviceName: "Toaster" }).deviceName).toBe("Laptop (Standard)");
  });
});

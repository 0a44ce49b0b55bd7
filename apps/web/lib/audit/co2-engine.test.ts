import { calculateCo2Keep, calculateCo2New, calculateCo2Refurb, calculateUsageCo2 } from "./co2-engine";

const LAPTOP = "Laptop (Standard)";
const ADMIN = "Admin Normal (HR/Finance)";

describe("CO2 engine", () => {
  test("usage uses the country grid factor", () => {
    // 0.030 kW × 1760 h × 0.052 kg/kWh
    expect(calculateUsageCo2(LAPTOP, ADMIN, "FR")).toBe(2.75);
  });

  test("country codes are case-insensitive", () => {
    expect(calculateUsageCo2(LAPTOP, ADMIN, "fr")).toBe(2.75);
  });

  test("unknown country falls back to the default factor", () => {
    // 0.030 × 1760 × 0.270
    expect(calculateUsageCo2(LAPTOP, ADMIN, "ZZ")).toBe(14.26);
  });

  test("override replaces the table factor", () => {
    expect(calculateUsageCo2(LAPTOP, ADMIN, "FR", undefined, 0.5)).toBe(26.4);
  });

  test("keep carries no manufacturing share", () => {
    const keep = calculateCo2Keep(LAPTOP, ADMIN, "FR");
    expect(keep.total).toBe(2.75);
    expect(keep.breakdown.manufacturing).toBe(0);
  });

  test("new amortizes manufacturing over the lifespan", () => {
    const fresh = calculateCo2New(LAPTOP, ADMIN, "FR");
    expect(fresh.breakdown.manufacturing).toBe(62.5);
    expect(fresh.total).toBe(65.25);
  });

  test("refurbished keeps 15% of manufacturing over the warranty", () => {
    const refurb = calculateCo2Refurb(LAPTOP, ADMIN, "FR");
    expect(refurb.available).toBe(true);
    expect(refurb.breakdown.manufacturing).toBe(18.75);
    expect(refurb.total).toBe(21.78);
  });

  test("refurbished is unavailable for devices without a refurb market", () => {
    const refurb = calculateCo2Refurb("iPhone 16e (New Target)", ADMIN, "FR");
    expect(refurb.available).toBe(false);
    expect(refurb.total).toBe(Infinity);
  });
});

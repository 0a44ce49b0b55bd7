import {
  calculateAnnualCost,
  calculateAnnualEmissions,
  calculateAnnualWater,
  calculateArchivalNeeded,
  calculateArchivalStrategy,
  calculateBaselineMetrics,
  calculateCarbonIntensity,
  calculateCumulativeSavings,
  getCloudProviders,
} from "./storage-engine";

describe("base formulas", () => {
  test("emissions, water and cost", () => {
    expect(calculateAnnualEmissions(1000, 100)).toBeCloseTo(120, 9);
    expect(calculateAnnualWater(1000)).toBeCloseTo(2280, 9);
    expect(calculateAnnualCost(1000, 250, 0.022, 0.004)).toBeCloseTo(210, 9);
  });
});

describe("providers", () => {
  test("distinct providers in table order", () => {
    expect(getCloudProviders()).toEqual(["AWS", "Azure", "GCP", "Alibaba Cloud"]);
  });

  test("intensity from the first offer of the selection", () => {
    // AWS S3 Standard: 6.0 kg/TB/month → 72 / 1228.8 × 1000
    expect(calculateCarbonIntensity(["AWS"])).toBeCloseTo(58.59375, 9);
    expect(calculateCarbonIntensity(["GCP", "Azure"])).toBeCloseTo(((5.8 * 12) / 1228.8) * 1000, 9);
  });

  test("empty selection defaults to AWS, unknown provider to 6 kg", () => {
    expect(calculateCarbonIntensity([])).toBeCloseTo(58.59375, 9);
    expect(calculateCarbonIntensity(["Nimbus"])).toBeCloseTo(58.59375, 9);
  });
});

describe("calculateBaselineMetrics", () => {
  test("one TB on AWS standard", () => {
    const m = calculateBaselineMetrics(1024, 58.59375);
    expect(m.emissionsKg).toBeCloseTo(72, 9);
    expect(m.waterLiters).toBeCloseTo(2334.72, 9);
    expect(m.showers).toBeCloseTo(46.6944, 9);
    expect(m.trees).toBeCloseTo(72 / 22, 9);
  });
});

describe("calculateArchivalNeeded", () => {
  const rows = calculateArchivalNeeded({
    currentStorageGb: 1000,
    targetEmissionsKg: 100,
    carbonIntensity: 100,
    yearsAhead: 1,
    annualGrowthRate: 0.1,
    archivalReduction: 0.9,
    standardCostPerGbMonth: 0.022,
    archiveCostPerGbMonth: 0.004,
  });

  test("archives just enough to meet the target", () => {
    expect(rows).toHaveLength(1);
    const [y1] = rows;
    expect(y1.storageGb).toBeCloseTo(1100, 9);
    expect(y1.emissionsWithoutArchivalKg).toBeCloseTo(132, 9);
    expect(y1.archiveGb).toBeCloseTo(296.296, 3);
    expect(y1.emissionsAfterArchivalKg).toBeCloseTo(100, 9);
    expect(y1.waterSavingsL).toBeCloseTo(608, 9);
    expect(y1.costSavingsEur).toBeCloseTo(64, 9);
    expect(y1.meetsTarget).toBe(true);
  });

  test("nothing archived when already under target", () => {
    const [y1] = calculateArchivalNeeded({
      currentStorageGb: 100,
      targetEmissionsKg: 100,
      carbonIntensity: 100,
      yearsAhead: 1,
      annualGrowthRate: 0,
      archivalReduction: 0.9,
      standardCostPerGbMonth: 0.022,
      archiveCostPerGbMonth: 0.004,
    });
    expect(y1.archiveGb).toBe(0);
    expect(y1.costSavingsEur).toBe(0);
  });

  test("archive volume is capped by storage and the target can be missed", () => {
    const [y1] = calculateArchivalNeeded({
      currentStorageGb: 1000,
      targetEmissionsKg: 0,
      carbonIntensity: 100,
      yearsAhead: 1,
      annualGrowthRate: 0,
      archivalReduction: 0.5,
      standardCostPerGbMonth: 0.022,
      archiveCostPerGbMonth: 0.004,
    });
    expect(y1.archiveGb).toBe(1000);
    expect(y1.emissionsAfterArchivalKg).toBeCloseTo(60, 9);
    expect(y1.meetsTarget).toBe(false);
  });
});

describe("calculateArchivalStrategy / calculateCumulativeSavings", () => {
  const rows = calculateArchivalStrategy({
    storageGb: 1000,
    reductionTargetPct: 50,
    dataGrowthRatePct: 0,
    carbonIntensity: 100,
    projectionYears: 2,
  });

  test("halves emissions each year", () => {
    expect(rows).toHaveLength(2);
    expect(rows[0].emissionsWithoutArchivalKg).toBeCloseTo(120, 9);
    expect(rows[0].emissionsAfterArchivalKg).toBeCloseTo(60, 9);
    expect(rows[0].archiveTb).toBeCloseTo(555.5556 / 1024, 6);
    expect(rows[0].waterSavingsL).toBeCloseTo(1140, 9);
    expect(rows[0].costSavingsEur).toBeCloseTo(120, 9);
  });

  test("cumulative totals", () => {
    const total = calculateCumulativeSavings(rows);
    expect(total.co2SavedKg).toBeCloseTo(120, 9);
    expect(total.waterSavedL).toBeCloseTo(2280, 9);
    expect(total.eurSaved).toBeCloseTo(240, 9);
    expect(total.showersSaved).toBeCloseTo(45.6, 9);
    expect(total.treesEquivalent).toBeCloseTo(120 / 22, 9);
  });
});

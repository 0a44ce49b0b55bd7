import {
  calculateWithRange,
  generateMethodologyMarkdown,
  getAssumptionTooltip,
  getCalculationMethods,
  getCo2SavingsRange,
  getStrandedValueRange,
  reportMethodologyNotes,
} from "./methodology";
import { DISCLAIMERS } from "./disclaimers";

describe("calculateWithRange", () => {
  test("explicit range scales by ratio to the assumption value", () => {
    expect(calculateWithRange(100, "electricity_price_france")).toEqual({
      value: 100,
      low: 81.82,
      high: 127.27,
      confidence: "HIGH",
      note: "Enterprise rate, may vary by contract",
    });
  });

  test("no explicit range falls back to the confidence variance", () => {
    const r = calculateWithRange(100, "lag_sensitivity");
    expect(r.low).toBe(50);
    expect(r.high).toBe(150);
    expect(r.confidence).toBe("LOW");
  });

  test("theoretical assumptions get ±75%", () => {
    const r = calculateWithRange(1000, "stranded_value");
    expect(r.low).toBe(250);
    expect(r.high).toBe(1750);
  });

  test("unknown key returns a flat range", () => {
    expect(calculateWithRange(42, "nope")).toEqual({
      value: 42,
      low: 42,
      high: 42,
      confidence: "UNKNOWN",
      note: "No assumption data available",
    });
  });
});

describe("getStrandedValueRange", () => {
  test("depreciates at 30% per year and applies realistic bands", () => {
    const r = getStrandedValueRange(100, 2, 1000);
    expect(r.theoreticalValue).toBe(49000);
    expect(r.realisticLow).toBe(5880);
    expect(r.realisticMid).toBe(14700);
    expect(r.realisticHigh).toBe(27440);
    expect(r.confidence).toBe("LOW");
    expect(r.displayRange).toBe("€7,350 - €17,150");
  });
});

describe("getCo2SavingsRange", () => {
  test("low / mid / high tonnes", () => {
    const r = getCo2SavingsRange(1200, 4, 0.5);
    expect(r.lowTonnes).toBe(38.3);
    expect(r.midTonnes).toBe(43.8);
    expect(r.highTonnes).toBe(49.8);
    expect(r.confidence).toBe("MEDIUM");
  });
});

describe("text output", () => {
  test("tooltip includes range, source and note", () => {
    expect(getAssumptionTooltip("electricity_price_france")).toBe(
      "Electricity Price (France, Enterprise): 0.22 €/kWh (range: 0.18-0.28) | " +
        "Source: Eurostat - Electricity prices for non-household consumers | Note: Enterprise rate, may vary by contract",
    );
  });

  test("unknown tooltip is empty", () => {
    expect(getAssumptionTooltip("nope")).toBe("");
  });

  test("markdown lists every method and the disclaimers", () => {
    const md = generateMethodologyMarkdown();
    expect(md.startsWith("# GreenFleet Methodology\n")).toBe(true);
    expect(md).toContain("| **THEORETICAL** | Model-based, not validated | ±75% |");
    for (const m of Object.values(getCalculationMethods())) {
      expect(md).toContain(`### ${m.name}\n`);
    }
    expect(md).toContain(DISCLAIMERS.general);
  });

  test("formulas are rendered as inline code", () => {
    const md = generateMethodologyMarkdown();
    expect(md).toContain("**Formula**: `CO2_usage = Power_kW × Annual_hours × Grid_factor`");
  });

  test("report notes use plain CO2", () => {
    const notes = reportMethodologyNotes();
    expect(notes).toHaveLength(7);
    expect(notes[4]).toBe("CO2 - Usage Emissions: CO2_usage = Power_kW × Annual_hours × Grid_factor (confidence: HIGH)");
  });
});

import { renderFleetReportPdf, type FleetReportInput, type ReportDeviceRow } from "../index";

function device(i: number): ReportDeviceRow {
  return {
    deviceName: i % 2 === 0 ? "Laptop (Standard)" : "Smartphone (Generic)",
    ageYears: 1 + (i % 6),
    persona: "Admin (HR/Finance)",
    businessUnit: i % 3 === 0 ? "Couture" : "Beauty Retail",
    recommendation: i % 4 === 0 ? "REFURBISHED" : "KEEP",
    urgency: i % 5 === 0 ? "HIGH" : "LOW",
    annualSavings: 100 * i,
    co2Savings: 2.5 * i,
    residualValue: 50,
  };
}

function input(n: number): FleetReportInput {
  return {
    goal: "balanced",
    generatedAt: new Date("2026-03-09T10:00:00Z"),
    summary: {
      totalDevices: n,
      byRecommendation: { KEEP: n, NEW: 0, REFURBISHED: 0 },
      byUrgency: { HIGH: 0, MEDIUM: 0, LOW: n },
      totalAnnualSavingsEur: 1234.5,
      totalCo2SavingsKg: 42,
      totalRecoverableValueEur: 900,
      averageAgeYears: 3.2,
      byBusinessUnit: {
        Couture: { count: 1, savings: 100, co2: 2, highUrgency: 0 },
        "Beauty Retail": { count: 2, savings: 300, co2: 4, highUrgency: 1 },
      },
    },
    devices: Array.from({ length: n }, (_, i) => device(i)),
    methodologyNotes: ["TCO = energy + productivity loss + residual value loss"],
    disclaimer: "Estimates only.",
  };
}

describe("renderFleetReportPdf", () => {
  test("produces a PDF document", async () => {
    const pdf = await renderFleetReportPdf(input(3));
    expect(pdf.buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pdf.buffer.toString("latin1").trimEnd().endsWith("%%EOF")).toBe(true);
    expect(pdf.pdf_hash).toMatch(/^[0-9a-f]{64}$/);
    expect(pdf.pages).toBe(1);
  });

  test("long fleets span several pages", async () => {
    const pdf = await renderFleetReportPdf(input(200));
    expect(pdf.pages).toBeGreaterThan(3);
  });

  test("empty fleet still renders", async () => {
    const pdf = await renderFleetReportPdf({ ...input(0), summary: { ...input(0).summary, byBusinessUnit: {} } });
    expect(pdf.buffer.length).toBeGreaterThan(0);
    expect(pdf.pages).toBe(1);
  });
});

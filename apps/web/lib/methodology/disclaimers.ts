/**
 * Methodology disclaimers — shown with every report and on /api/methodology
 */

export const DISCLAIMERS = {
  general:
    "Disclaimer: GreenFleet provides estimates based on industry benchmarks and publicly available data. " +
    "Actual results may vary significantly with your circumstances, market conditions and implementation approach. " +
    "Use these projections for directional planning, not as precise financial forecasts.",
  strandedValue:
    "About Stranded Value: this metric is the theoretical residual value of devices under standard depreciation curves. " +
    "Recoverable value depends on resale strategy, data security requirements and market conditions. " +
    "Enterprises that do not resell for security reasons recover €0.",
  productivity:
    "About Productivity Estimates: productivity loss figures come from industry research (Gartner Digital Workplace Study 2023) " +
    "and are hard to measure precisely. Treat them as illustrative.",
  co2:
    "About CO₂ Calculations: footprints come from manufacturer environmental reports and follow the GHG Protocol. " +
    "Grid factors are annual averages; real-time emissions vary by hour and season. " +
    "For Scope 3 reporting, check alignment with your company's methodology.",
  refurbished:
    "About Refurbished Devices: availability, pricing and quality vary by model, region and supplier. " +
    "The 80% CO₂ saving is a conservative figure from Dell's Circular Economy Report. " +
    "Enterprise-grade refurbished supply may be limited for specific models.",
} as const;

export type DisclaimerKey = keyof typeof DISCLAIMERS;

#!/usr/bin/env npx tsx
/**
 * Fleet Audit Report — CSV in, summary + CSV/PDF out
 *
 * Pipeline:
 *   1. Read a fleet CSV (or generate the seeded demo fleet)
 *   2. Analyse every device for the chosen goal
 *   3. Print the fleet summary
 *   4. Write fleet_audit_{YYYYMMDD}.csv and/or .pdf
 *
 * Usage:
 *   npx tsx scripts/fleet_audit_report.ts --input data/fleet.csv
 *   npx tsx scripts/fleet_audit_report.ts --demo 200 --seed 7 --goal eco_first --format pdf
 *
 * Options:
 *   --input <path>      fleet CSV (Device_Model;Age_Years;Persona;Country;Business_Unit)
 *   --demo <n>          demo fleet of n devices instead of --input (default 50)
 *   --seed <n>          demo seed (default 42)
 *   --goal <goal>       balanced | cost_first | eco_first
 *   --format <list>     csv,pdf (default both)
 *   --out-dir <dir>     output directory (default ./reports)
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { basename, join, resolve } from "path";
import { renderFleetReportPdf } from "@greenfleet/reports";
import { parseFleetCsv } from "@/lib/audit/fleet-parser";
import { generateDemoFleet } from "@/lib/audit/demo-fleet";
import { analyzeFleet, summarizeFleet } from "@/lib/audit/fleet-analyzer";
import { fleetAnalysesToCsv } from "@/lib/audit/export-csv";
import { OPTIMIZATION_GOALS } from "@/lib/audit/recommendation-engine";
import { reportMethodologyNotes } from "@/lib/methodology/methodology";
import { DISCLAIMERS } from "@/lib/methodology/disclaimers";
import { getAuditLogger } from "@/lib/audit-trail";
import type { FleetRow, OptimizationGoal } from "@/lib/types/audit";

const PROJECT_ROOT = resolve(__dirname, "..");

// ─── Args ────────────────────────────────────────────────────────────────────

interface Args {
  input: string;
  demo: number;
  seed: number;
  goal: OptimizationGoal;
  formats: string[];
  outDir: string;
}

const VALUE_FLAGS = ["--input", "--demo", "--seed", "--goal", "--format", "--out-dir"];

export function parseArgs(argv: string[] = process.argv.slice(2)): Args {
  const out: Args = { input: "", demo: 50, seed: 42, goal: "balanced", formats: ["csv", "pdf"], outDir: join(PROJECT_ROOT, "reports") };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (!VALUE_FLAGS.includes(flag)) throw new Error(`Unknown option: ${flag}`);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new Error(`${flag} needs a value`);
    i++;

    if (flag === "--input") out.input = next;
    else if (flag === "--demo") out.demo = parseInt(next, 10);
    else if (flag === "--seed") out.seed = parseInt(next, 10);
    else if (flag === "--format") out.formats = next.split(",").map(s => s.trim().toLowerCase());
    else if (flag === "--out-dir") out.outDir = resolve(next);
    else {
      const goal = OPTIMIZATION_GOALS.find(g => g === next);
      if (!goal) throw new Error(`Invalid goal: ${next}. Valid: ${OPTIMIZATION_GOALS.join(", ")}`);
      out.goal = goal;
    }
  }

  if (!Number.isInteger(out.demo) || out.demo < 1) throw new Error("--demo must be a positive integer");
  if (!Number.isInteger(out.seed)) throw new Error("--seed must be an integer");
  return out;
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main() {
  const args = parseArgs();
  const audit = getAuditLogger();

  let rows: FleetRow[];
  if (args.input) {
    const path = resolve(args.input);
    if (!existsSync(path)) throw new Error(`Input not found: ${path}`);
    const parsed = parseFleetCsv(readFileSync(path, "utf-8"));
    audit.logFleetUpload(basename(path), parsed.rowCount, parsed.rows.length, parsed.errors);
    for (const w of parsed.warnings) console.warn(`[fleet-report] ${w}`);
    if (parsed.errors.length > 0) throw new Error(parsed.errors.join("; "));
    rows = parsed.rows;
    console.log(`[fleet-report] ${rows.length} devices read from ${path}`);
  } else {
    rows = generateDemoFleet(args.demo, args.seed);
    console.log(`[fleet-report] Demo fleet: ${rows.length} devices (seed ${args.seed})`);
  }

  const analyses = analyzeFleet(rows, args.goal);
  const summary = summarizeFleet(analyses);
  audit.logFleetAnalysis(summary.totalDevices, summary.averageAgeYears, summary.byRecommendation, summary.byUrgency);

  const r = summary.byRecommendation;
  const u = summary.byUrgency;
  console.log(`[fleet-report] Goal:              ${args.goal}`);
  console.log(`[fleet-report] Average age:       ${summary.averageAgeYears.toFixed(1)} years`);
  console.log(`[fleet-report] Keep/New/Refurb:   ${r.KEEP} / ${r.NEW} / ${r.REFURBISHED}`);
  console.log(`[fleet-report] Urgency H/M/L:     ${u.HIGH} / ${u.MEDIUM} / ${u.LOW}`);
  console.log(`[fleet-report] Annual savings:    €${Math.round(summary.totalAnnualSavingsEur).toLocaleString("en-US")}`);
  console.log(`[fleet-report] CO2 avoided:       ${Math.round(summary.totalCo2SavingsKg).toLocaleString("en-US")} kg/year`);
  console.log(`[fleet-report] Recoverable value: €${Math.round(summary.totalRecoverableValueEur).toLocaleString("en-US")}`);

  mkdirSync(args.outDir, { recursive: true });
  const stamp = new Date().toISOString().slice(0, 10).replace(/-/g, "");

  if (args.formats.includes("csv")) {
    const csv = fleetAnalysesToCsv(analyses);
    const path = join(args.outDir, `fleet_audit_${stamp}.csv`);
    writeFileSync(path, csv, "utf-8");
    audit.logExport("csv", analyses.length, Buffer.byteLength(csv, "utf8"));
    console.log(`[fleet-report] CSV → ${path}`);
  }

  if (args.formats.includes("pdf")) {
    const pdf = await renderFleetReportPdf({
      goal: args.goal,
      summary,
      devices: analyses,
      methodologyNotes: reportMethodologyNotes(),
      disclaimer: DISCLAIMERS.general,
    });
    const path = join(args.outDir, `fleet_audit_${stamp}.pdf`);
    writeFileSync(path, pdf.buffer);
    audit.logExport("pdf", analyses.length, pdf.buffer.length);
    console.log(`[fleet-report] PDF → ${path} (${pdf.pages} pages, sha256 ${pdf.pdf_hash.slice(0, 16)}...)`);
  }

  console.log("[fleet-report] ✅ Done");
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[fleet-report] FATAL:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}

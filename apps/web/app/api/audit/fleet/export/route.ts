/**
 * POST /api/audit/fleet/export
 *
 * Same input as /api/audit/fleet plus "format": "csv" | "pdf".
 * Returns the file as an attachment; the PDF hash is in X-Report-Hash.
 */

import { NextRequest, NextResponse } from "next/server";
import { renderFleetReportPdf } from "@greenfleet/reports";
import { analyzeFleet, summarizeFleet } from "@/lib/audit/fleet-analyzer";
import { fleetAnalysesToCsv } from "@/lib/audit/export-csv";
import { OPTIMIZATION_GOALS } from "@/lib/audit/recommendation-engine";
import { reportMethodologyNotes } from "@/lib/methodology/methodology";
import { DISCLAIMERS } from "@/lib/methodology/disclaimers";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import { readFleetInput } from "@/lib/api/fleet-input";
import { optionalEnum, optionalNumberRecord, readJsonBody } from "@/lib/api/request-validation";

const ROUTE = "/api/audit/fleet/export";
const FORMATS = ["csv", "pdf"] as const;

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const format = optionalEnum(body, "format", FORMATS, "csv");
    const goal = optionalEnum(body, "goal", OPTIMIZATION_GOALS, "balanced");
    const gridOverrides = optionalNumberRecord(body, "grid_overrides");
    const audit = getAuditLogger();

    const { rows } = readFleetInput(body, audit, ROUTE);
    const analyses = analyzeFleet(rows, goal, undefined, gridOverrides);
    const stamp = new Date().toISOString().slice(0, 10).replace(/-/g, "");

    if (format === "csv") {
      const csv = fleetAnalysesToCsv(analyses);
      recordAudit(ROUTE, () => audit.logExport("csv", analyses.length, Buffer.byteLength(csv, "utf8")));
      return new NextResponse(csv, {
        headers: {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="fleet_audit_${stamp}.csv"`,
        },
      });
    }

    const pdf = await renderFleetReportPdf({
      goal,
      summary: summarizeFleet(analyses),
      devices: analyses,
      methodologyNotes: reportMethodologyNotes(),
      disclaimer: DISCLAIMERS.general,
    });
    recordAudit(ROUTE, () => audit.logExport("pdf", analyses.length, pdf.buffer.length));

    return new NextResponse(new Uint8Array(pdf.buffer), {
      headers: {
        "Content-Type": "application/pdf",
        "Content-Disposition": `attachment; filename="fleet_audit_${stamp}.pdf"`,
        "X-Report-Hash": pdf.pdf_hash,
      },
    });
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

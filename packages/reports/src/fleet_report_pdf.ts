/**
 * Fleet audit PDF report
 *
 * Sections: header, summary, per-unit table, per-device table,
 * methodology notes, disclaimer. Rendered in memory with pdfkit; the
 * caller decides whether to stream, store or hash the buffer.
 */

import { createHash } from "crypto";
import PDFDocument from "pdfkit";
import type { FleetReportInput, FleetReportPdf } from "./types";

// ─── Layout Constants ────────────────────────────────────────────────────────

const MARGIN = 50;
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;
const ROW_HEIGHT = 16;

const FONT_SIZES = { title: 18, h2: 13, body: 9.5, small: 8 };

const DEVICE_COLS = [150, 35, 90, 70, 50, 50, 50];
const UNIT_COLS = [175, 60, 60, 100, 100];

// ─── Helpers ─────────────────────────────────────────────────────────────────

function fmtInt(v: number): string { return Math.round(v).toLocaleString("en-US"); }
function fmtEur(v: number): string { return `€${fmtInt(v)}`; }

type Doc = PDFKit.PDFDocument;

class Cursor {
  y = MARGIN;

  constructor(private readonly doc: Doc) {}

  newPage(): void {
    this.doc.addPage();
    this.y = MARGIN;
  }

  /** Start a new page when fewer than `needed` points remain. */
  ensure(needed: number): void {
    if (this.y + needed > PAGE_HEIGHT - MARGIN) this.newPage();
  }
}

function heading(doc: Doc, c: Cursor, text: string): void {
  c.ensure(40);
  doc.fillColor("#1a1a1a").fontSize(FONT_SIZES.h2).font("Helvetica-Bold").text(text, MARGIN, c.y);
  c.y += 20;
}

function drawRow(doc: Doc, cells: string[], widths: number[], c: Cursor, isHeader: boolean): void {
  const total = widths.reduce((a, b) => a + b, 0);
  if (isHeader) {
    doc.rect(MARGIN, c.y, total, ROW_HEIGHT).fillColor("#f1f5f9").fill();
  }
  doc.fillColor(isHeader ? "#475569" : "#333333")
     .fontSize(FONT_SIZES.small)
     .font(isHeader ? "Helvetica-Bold" : "Helvetica");

  let cx = MARGIN;
  for (let j = 0; j < cells.length; j++) {
    doc.text(cells[j], cx + 4, c.y + 4, {
      width: widths[j] - 8,
      height: ROW_HEIGHT - 4,
      ellipsis: true,
      lineBreak: false,
      align: j === 0 ? "left" : "right",
    });
    cx += widths[j];
  }
  c.y += ROW_HEIGHT;
  doc.strokeColor("#e2e8f0").lineWidth(0.5).moveTo(MARGIN, c.y).lineTo(MARGIN + total, c.y).stroke();
}

/** Header row repeats on every page the table spans. */
function drawTable(doc: Doc, c: Cursor, header: string[], rows: string[][], widths: number[]): void {
  c.ensure(ROW_HEIGHT * 2);
  drawRow(doc, header, widths, c, true);
  for (const row of rows) {
    if (c.y + ROW_HEIGHT > PAGE_HEIGHT - MARGIN) {
      c.newPage();
      drawRow(doc, header, widths, c, true);
    }
    drawRow(doc, row, widths, c, false);
  }
  c.y += 15;
}

// ─── Renderer ────────────────────────────────────────────────────────────────

export function renderFleetReportPdf(input: FleetReportInput): Promise<FleetReportPdf> {
  const generatedAt = input.generatedAt ?? new Date();
  const title = input.title ?? "Fleet Audit Report";
  const s = input.summary;

  return new Promise((res, rej) => {
    const doc = new PDFDocument({
      size: "A4",
      margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
      info: {
        Title: title,
        Subject: `IT fleet lifecycle audit (${s.totalDevices} devices)`,
        Creator: "GreenFleet report engine (pdfkit)",
        CreationDate: generatedAt,
      },
    });

    const chunks: Buffer[] = [];
    let pages = 1;
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("pageAdded", () => { pages++; });
    doc.on("error", rej);

    const c = new Cursor(doc);

    doc.on("end", () => {
      const buffer = Buffer.concat(chunks);
      res({
        buffer,
        pdf_hash: createHash("sha256").update(buffer).digest("hex"),
        pages,
      });
    });

    // ─── Header ──────────────────────────────────────────────────────
    doc.fontSize(FONT_SIZES.title).font("Helvetica-Bold").fillColor("#1a1a1a").text(title, MARGIN, c.y);
    c.y += 26;
    doc.fontSize(FONT_SIZES.small).font("Helvetica").fillColor("#666666")
       .text(`Generated: ${generatedAt.toISOString()}  |  Goal: ${input.goal}  |  Devices: ${s.totalDevices}`, MARGIN, c.y);
    c.y += 20;
    doc.strokeColor("#e2e8f0").lineWidth(1).moveTo(MARGIN, c.y).lineTo(PAGE_WIDTH - MARGIN, c.y).stroke();
    c.y += 15;

    // ─── Summary ─────────────────────────────────────────────────────
    heading(doc, c, "Summary");
    const rec = s.byRecommendation;
    const urg = s.byUrgency;
    drawTable(doc, c, ["Metric", "Value"], [
      ["Devices analysed", String(s.totalDevices)],
      ["Average age (years)", s.averageAgeYears.toFixed(1)],
      ["Keep / New / Refurbished", `${rec.KEEP ?? 0} / ${rec.NEW ?? 0} / ${rec.REFURBISHED ?? 0}`],
      ["Urgency high / medium / low", `${urg.HIGH ?? 0} / ${urg.MEDIUM ?? 0} / ${urg.LOW ?? 0}`],
      ["Annual savings", fmtEur(s.totalAnnualSavingsEur)],
      ["CO2 avoided (kg/year)", fmtInt(s.totalCo2SavingsKg)],
      ["Recoverable value", fmtEur(s.totalRecoverableValueEur)],
    ], [300, 195]);

    // ─── Business units ──────────────────────────────────────────────
    heading(doc, c, "By business unit");
    const units = Object.entries(s.byBusinessUnit).sort((a, b) => b[1].savings - a[1].savings);
    drawTable(doc, c, ["Business unit", "Devices", "High", "Savings", "CO2 kg"],
      units.map(([name, u]) => [name, String(u.count), String(u.highUrgency), fmtEur(u.savings), fmtInt(u.co2)]),
      UNIT_COLS);

    // ─── Devices ─────────────────────────────────────────────────────
    heading(doc, c, "Devices");
    drawTable(doc, c, ["Device", "Age", "Unit", "Action", "Urgency", "Savings", "CO2 kg"],
      input.devices.map(d => [
        d.deviceName,
        d.ageYears.toFixed(1),
        d.businessUnit || "Unknown",
        d.recommendation,
        d.urgency,
        fmtEur(d.annualSavings),
        fmtInt(d.co2Savings),
      ]),
      DEVICE_COLS);

    // ─── Methodology ─────────────────────────────────────────────────
    heading(doc, c, "Methodology");
    doc.fontSize(FONT_SIZES.body).font("Helvetica").fillColor("#333333");
    for (const line of input.methodologyNotes) {
      const h = doc.heightOfString(line, { width: CONTENT_WIDTH });
      c.ensure(h + 4);
      doc.text(line, MARGIN, c.y, { width: CONTENT_WIDTH });
      c.y += h + 4;
    }
    c.y += 10;

    // ─── Disclaimer ──────────────────────────────────────────────────
    const dh = doc.fontSize(FONT_SIZES.small).heightOfString(input.disclaimer, { width: CONTENT_WIDTH });
    c.ensure(dh + 10);
    doc.strokeColor("#e2e8f0").lineWidth(0.5).moveTo(MARGIN, c.y).lineTo(PAGE_WIDTH - MARGIN, c.y).stroke();
    c.y += 8;
    doc.font("Helvetica").fillColor("#999999").text(input.disclaimer, MARGIN, c.y, { width: CONTENT_WIDTH });

    doc.end();
  });
}

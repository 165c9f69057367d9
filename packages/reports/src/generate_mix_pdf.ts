/**
 * Generation Mix PDF
 *
 * One-page A4 rendition of the mix verification: per-fuel MW and share at
 * the latest timestamp. Built-in Helvetica has no CJK glyphs, so fuels are
 * printed by their English names.
 *
 * The document's SHA-256 is returned alongside the path.
 */

import { createWriteStream, readFileSync } from "fs";
import { createHash } from "crypto";
import PDFDocument from "pdfkit";
import { englishFuelName } from "../../pipeline/src/fuel_types";
import type { MixSummary } from "./verify_output";

// ─── Layout Constants ────────────────────────────────────────────────────────

const MARGIN = 50;
const PAGE_WIDTH = 595.28;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;

const FONT_SIZES = { title: 18, h2: 13, body: 9.5, small: 8 };

/** MW with one decimal and thousands separators: 1234.56 → "1,234.6" */
export function fmtMw(v: number): string {
  return v.toLocaleString("en-US", { minimumFractionDigits: 1, maximumFractionDigits: 1 });
}

export interface MixPdfResult {
  file_path: string;
  pdf_hash: string;
}

export function mixTableRows(mix: MixSummary): string[][] {
  return [
    ["Source", "Net MW", "Share"],
    ...mix.fuels.map(f => [englishFuelName(f.fuel_type), fmtMw(f.mw), `${f.percentage.toFixed(3)}%`]),
    ["Total", fmtMw(mix.total_mw), mix.total_mw > 0 ? "100.000%" : "0.000%"],
  ];
}

export function generateMixPdf(mix: MixSummary, outputPath: string): Promise<MixPdfResult> {
  return new Promise((res, rej) => {
    const doc = new PDFDocument({
      size: "A4",
      margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
      info: {
        Title: `Generation mix — ${mix.latest_timestamp}`,
        Subject: "Net generation by fuel type, Taiwan power system",
        Creator: "grid-weather-pipeline (pdfkit)",
      },
    });

    const stream = createWriteStream(outputPath);
    doc.pipe(stream);
    let y = MARGIN;

    // ─── Header ──────────────────────────────────────────────────────
    doc.fontSize(FONT_SIZES.title).font("Helvetica-Bold").fillColor("#1a1a1a")
       .text("Generation Mix", MARGIN, y);
    y += 26;

    doc.fontSize(FONT_SIZES.body).font("Helvetica").fillColor("#666666")
       .text(`Timestamp (Asia/Taipei): ${mix.latest_timestamp}  |  Tables: ${mix.tables}`, MARGIN, y);
    y += 20;

    doc.strokeColor("#e2e8f0").lineWidth(1).moveTo(MARGIN, y).lineTo(PAGE_WIDTH - MARGIN, y).stroke();
    y += 15;

    // ─── Mix Table ───────────────────────────────────────────────────
    doc.fillColor("#1a1a1a").fontSize(FONT_SIZES.h2).font("Helvetica-Bold")
       .text("Net generation by fuel", MARGIN, y);
    y += 20;

    y = drawTable(doc, mixTableRows(mix), MARGIN, y, [240, 120, 100]);
    y += 15;

    doc.fontSize(FONT_SIZES.small).font("Helvetica").fillColor("#999999")
       .text("Sums of the 10-minute segmented tables at the latest timestamp. Shares are of the total net generation.",
         MARGIN, y, { width: CONTENT_WIDTH });

    doc.end();

    stream.on("finish", () => {
      const pdfHash = createHash("sha256").update(readFileSync(outputPath)).digest("hex");
      res({ file_path: outputPath, pdf_hash: pdfHash });
    });
    stream.on("error", rej);
  });
}

// ─── Table Drawing ───────────────────────────────────────────────────────────

function drawTable(doc: PDFKit.PDFDocument, rows: string[][], x: number, startY: number, colWidths: number[]): number {
  let y = startY;
  const rowHeight = 16;
  const width = colWidths.reduce((a, b) => a + b, 0);

  rows.forEach((row, i) => {
    const isHeader = i === 0;
    const isTotal = i === rows.length - 1;
    let cx = x;

    if (isHeader) doc.rect(x, y, width, rowHeight).fillColor("#f1f5f9").fill();

    doc.fillColor(isHeader ? "#475569" : "#333333")
       .fontSize(isHeader ? FONT_SIZES.small : FONT_SIZES.body)
       .font(isHeader || isTotal ? "Helvetica-Bold" : "Helvetica");

    row.forEach((cell, j) => {
      doc.text(cell, cx + 4, y + 3, { width: colWidths[j] - 8, align: j === 0 ? "left" : "right" });
      cx += colWidths[j];
    });

    y += rowHeight;
    doc.strokeColor("#e2e8f0").lineWidth(0.5).moveTo(x, y).lineTo(x + width, y).stroke();
  });

  return y;
}

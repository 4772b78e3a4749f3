// src/report/exportReport.ts
import { jsPDF } from "jspdf";
import { ExportError } from "../engine/errors";
import { REPORT_FILE_NAME, REPORT_FRAGMENTATION_HEADER, REPORT_TITLE } from "../models/defaultBlastPlan";

export interface ChartImage {
  png: Uint8Array;
  widthPx: number;
  heightPx: number;
}

export interface ReportCharts {
  holeGrid: ChartImage;
  fragmentation: ChartImage;
}

export interface ReportOptions {
  title?: string;
  fileName?: string;
}

export interface ExportedReport {
  bytes: Uint8Array;
  mimeType: "application/pdf";
  fileName: string;
}

// A4 portrait, millimetres
const IMAGE_X_MM = 10;
const IMAGE_W_MM = 180;
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Two-page report: title + hole grid, then the fragmentation curves under their header.
 * Everything is built in memory.
 */
export function exportReport(charts: ReportCharts, options: ReportOptions = {}): ExportedReport {
  assertPng("holeGrid", charts.holeGrid);
  assertPng("fragmentation", charts.fragmentation);

  let bytes: Uint8Array;
  try {
    const doc = new jsPDF({ unit: "mm", format: "a4" });

    doc.setFont("helvetica", "normal");
    doc.setFontSize(12);
    doc.text(options.title ?? REPORT_TITLE, 105, 17, { align: "center" });
    placeImage(doc, charts.holeGrid, 30);

    doc.addPage();
    doc.setFont("helvetica", "bold");
    doc.setFontSize(12);
    doc.text(REPORT_FRAGMENTATION_HEADER, IMAGE_X_MM, 17);
    placeImage(doc, charts.fragmentation, 25);

    bytes = new Uint8Array(doc.output("arraybuffer"));
  } catch (e) {
    throw new ExportError(`failed to encode PDF report: ${e instanceof Error ? e.message : String(e)}`, e);
  }

  return {
    bytes,
    mimeType: "application/pdf",
    fileName: options.fileName ?? REPORT_FILE_NAME,
  };
}

function placeImage(doc: jsPDF, img: ChartImage, yMm: number): void {
  const hMm = (IMAGE_W_MM * img.heightPx) / img.widthPx;
  doc.addImage(img.png, "PNG", IMAGE_X_MM, yMm, IMAGE_W_MM, hMm);
}

function assertPng(which: keyof ReportCharts, img: ChartImage): void {
  if (!(img.widthPx > 0) || !(img.heightPx > 0)) {
    throw new ExportError(`${which} image has no size (${img.widthPx}×${img.heightPx})`);
  }
  const isPng = img.png.length > PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => img.png[i] === b);
  if (!isPng) throw new ExportError(`${which} image is not a PNG`);
}

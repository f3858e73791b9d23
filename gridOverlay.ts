import { PDFDocument, rgb, StandardFonts, type PDFPage } from "pdf-lib";
import fs from "node:fs/promises";
import { pathToFileURL } from "node:url";

import { writeFileAtomic } from "./generateDocument.ts";
import { loadRecognitionManifest, type Box, type RecognitionManifest } from "./manifest.ts";

/**
 * Draws a debug grid onto every page of a PDF, and optionally outlines the
 * regions of a recognition manifest, for calibrating scanner offsets.
 *
 * Coordinates are in PDF points:
 * - origin (0,0) is bottom-left
 * - 1 point = 1/72 inch
 */
export async function addGridOverlay(inputBytes: Uint8Array, manifest?: RecognitionManifest): Promise<Uint8Array> {
  const pdfDoc = await PDFDocument.load(inputBytes);

  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);

  // === Grid settings ===
  const minorStep = 10;
  const majorStep = 50;

  const minorColor = rgb(0.85, 0.85, 0.85);
  const majorColor = rgb(0.65, 0.65, 0.65);
  const axisColor = rgb(0.2, 0.2, 0.2);

  const minorThickness = 0.5;
  const majorThickness = 1.0;
  const axisThickness = 1.5;

  const labelSize = 8;
  const labelPadding = 2;

  for (let i = 0; i < pdfDoc.getPageCount(); i++) {
    const page = pdfDoc.getPage(i);
    const { width, height } = page.getSize();

    page.drawLine({ start: { x: 0, y: 0 }, end: { x: width, y: 0 }, color: axisColor, thickness: axisThickness });
    page.drawLine({ start: { x: 0, y: 0 }, end: { x: 0, y: height }, color: axisColor, thickness: axisThickness });

    for (let x = 0; x <= width; x += minorStep) {
      const isMajor = x % majorStep === 0;
      page.drawLine({
        start: { x, y: 0 },
        end: { x, y: height },
        color: isMajor ? majorColor : minorColor,
        thickness: isMajor ? majorThickness : minorThickness,
      });
      if (isMajor) {
        page.drawText(`x=${x}`, { x: x + labelPadding, y: labelPadding, size: labelSize, font, color: axisColor });
      }
    }

    for (let y = 0; y <= height; y += minorStep) {
      const isMajor = y % majorStep === 0;
      page.drawLine({
        start: { x: 0, y },
        end: { x: width, y },
        color: isMajor ? majorColor : minorColor,
        thickness: isMajor ? majorThickness : minorThickness,
      });
      if (isMajor) {
        page.drawText(`y=${y}`, { x: labelPadding, y: y + labelPadding, size: labelSize, font, color: axisColor });
      }
    }

    if (manifest && i === 0) outlineManifest(page, manifest);
  }

  return pdfDoc.save();
}

function outlineManifest(page: PDFPage, manifest: RecognitionManifest) {
  const regionColor = rgb(0.1, 0.7, 0.2);
  const bubbleColor = rgb(0.9, 0.1, 0.1);
  const outline = (b: Box) =>
    page.drawRectangle({ x: b.x, y: b.y, width: b.width, height: b.height, borderColor: regionColor, borderWidth: 1 });
  const ring = (p: { x: number; y: number }) =>
    page.drawCircle({ x: p.x, y: p.y, size: manifest.bubbleRadius + 1, borderColor: bubbleColor, borderWidth: 0.5 });

  manifest.cornerMarkers.forEach(outline);
  outline(manifest.clientCode);
  Object.values(manifest.dateBubbles).flat().forEach(ring);
  for (const row of manifest.rows) {
    outline(row.marker);
    outline(row.code);
    row.tens.forEach(ring);
    row.ones.forEach(ring);
  }
}

async function main() {
  const [inputPath, outputPath, manifestPath] = process.argv.slice(2);

  if (!inputPath || !outputPath) {
    console.error("Usage: tsx gridOverlay.ts <input.pdf> <output.pdf> [manifest.json]");
    process.exit(1);
  }

  // Written by `generate.ts --manifest`, so it carries the sheet's own geometry.
  const manifest = manifestPath ? await loadRecognitionManifest(manifestPath) : undefined;

  const outBytes = await addGridOverlay(await fs.readFile(inputPath), manifest);
  await writeFileAtomic(outputPath, outBytes);
  console.log(`Wrote gridded PDF to: ${outputPath}`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}

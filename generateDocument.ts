import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { layoutDocument, type SheetLayout } from "./documentLayout.ts";
import { IOError } from "./errors.ts";
import type { Product } from "./productRow.ts";
import { renderSheetToPdfBytes, type RenderOptions } from "./renderPdf.ts";
import { a4Page, defaultSheetConfig, type PageGeometry, type SheetConfig } from "./sheetConfig.ts";

export type GenerateOptions = RenderOptions & {
  config?: SheetConfig;
  page?: PageGeometry;
};

export type GenerateResult = {
  outputPath: string;
  productCount: number;
  byteLength: number;
  layout: SheetLayout;
};

/**
 * Write to a sibling temp file, then rename over the target, so a failed run
 * never leaves a partial PDF at `outputPath`.
 */
export async function writeFileAtomic(outputPath: string, bytes: Uint8Array): Promise<void> {
  const dir = path.dirname(outputPath);
  const tmpPath = path.join(dir, `.${path.basename(outputPath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
  try {
    await fs.writeFile(tmpPath, bytes);
    await fs.rename(tmpPath, outputPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new IOError(`Cannot write "${outputPath}".`, outputPath, { cause: err });
  }
}

/**
 * Lay out, render and save one scantron sheet.
 *
 * Fails with ValidationError, LayoutOverflowError or EncodingError before
 * anything touches the disk, and with IOError if the file cannot be written.
 */
export async function generateDocument(
  clientId: string,
  clientName: string,
  products: readonly Product[],
  outputPath: string,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const layout = layoutDocument(
    { id: clientId, name: clientName },
    products,
    options.config ?? defaultSheetConfig,
    options.page ?? a4Page
  );

  const bytes = await renderSheetToPdfBytes(layout, {
    ...options,
    title: options.title ?? `Inventory count - ${clientName}`,
  });
  await writeFileAtomic(outputPath, bytes);

  console.log(`PDF generated and saved as '${outputPath}'.`);
  return { outputPath, productCount: products.length, byteLength: bytes.length, layout };
}

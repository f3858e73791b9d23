import type { DrawCommand } from "./drawCommands.ts";
import { layoutQuantityField } from "./quantityField.ts";
import { a4Page, type PageGeometry, type SheetConfig } from "./sheetConfig.ts";

export type Product = {
  name: string;
  id: string; // QR payload, used verbatim
};

/** Distance from the top of the page to the first row's baseline. */
export const PRODUCT_SECTION_DROP = 200;

// Offsets relative to the row baseline; identical for every row.
const MARKER_X = 10;
const MARKER_DY = -10;
const NAME_X = 30;
const NAME_DY = -10;
const NAME_FONT_SIZE = 12;
const CODE_X = 160;
const CODE_DY = -20;
const QUANTITY_X = 200;
const QUANTITY_DY = 13;

export function productSectionStart(page: PageGeometry = a4Page): number {
  return page.height - PRODUCT_SECTION_DROP;
}

/** Baseline of row `index`; rows stack downwards. */
export function rowBaseline(index: number, config: SheetConfig, page: PageGeometry = a4Page): number {
  return productSectionStart(page) - index * config.rowSpacing;
}

export type ProductRowGeometry = {
  baseline: number;
  marker: { x: number; y: number; size: number };
  name: { x: number; y: number };
  code: { x: number; y: number; size: number };
  quantity: { x: number; y: number };
};

export function productRowGeometry(index: number, config: SheetConfig, page: PageGeometry = a4Page): ProductRowGeometry {
  const baseline = rowBaseline(index, config, page);
  return {
    baseline,
    marker: { x: MARKER_X, y: baseline + MARKER_DY, size: config.markerSize },
    name: { x: NAME_X, y: baseline + NAME_DY },
    code: { x: CODE_X, y: baseline + CODE_DY, size: config.codeSize * config.productCodeScale },
    quantity: { x: QUANTITY_X, y: baseline + QUANTITY_DY },
  };
}

/** Marker, name, QR code, then the quantity field. Long names are not clipped. */
export function layoutProductRow(
  product: Product,
  index: number,
  config: SheetConfig,
  page: PageGeometry = a4Page
): DrawCommand[] {
  const g = productRowGeometry(index, config, page);
  return [
    { kind: "marker", ...g.marker },
    { kind: "text", ...g.name, text: product.name, weight: "regular", size: NAME_FONT_SIZE, align: "left" },
    { kind: "image", ...g.code, payload: product.id },
    ...layoutQuantityField(g.quantity.x, g.quantity.y, config),
  ];
}

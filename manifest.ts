import { horizontalBubbleCenter, verticalBubbleCenter } from "./bubbleGrid.ts";
import { dateFieldOrigins, dateFieldSpec } from "./dateField.ts";
import { clientCodeBox, cornerMarkers, dateSectionOrigin, type SheetLayout } from "./documentLayout.ts";
import { ValidationError } from "./errors.ts";
import { descendingDigits, quantityFieldMap, type DateFieldName } from "./fieldMap.ts";
import { productRowGeometry } from "./productRow.ts";
import { readJsonFile } from "./products.ts";
import { onesOriginX } from "./quantityField.ts";
import type { PageGeometry, SheetConfig } from "./sheetConfig.ts";

export type Box = { x: number; y: number; width: number; height: number };
export type Point = { x: number; y: number };
export type DateBubble = Point & { column: number; digit: number };

export type ManifestRow = {
  index: number;
  productId: string;
  baseline: number;
  marker: Box;
  code: Box;
  tens: Point[]; // digit i at tens[i]
  ones: Point[];
};

/** Everything a reader needs to find the marks on a scan of the sheet. Points, origin bottom-left. */
export type RecognitionManifest = {
  page: { width: number; height: number };
  bubbleRadius: number;
  cornerMarkers: Box[];
  clientCode: Box;
  dateBubbles: Record<DateFieldName, DateBubble[]>;
  rows: ManifestRow[];
};

const square = (b: { x: number; y: number; size: number }): Box => ({ x: b.x, y: b.y, width: b.size, height: b.size });

function dateBubbles(name: DateFieldName, config: SheetConfig, page: PageGeometry): DateBubble[] {
  const date = dateSectionOrigin(page);
  const origin = dateFieldOrigins(date.x, date.y, config)[name];
  const spec = dateFieldSpec(name, config);
  return spec.columns.flatMap((column, c) =>
    descendingDigits(column).map((digit, r) => ({
      ...verticalBubbleCenter(origin.x, origin.y, c, r, spec.columnSpacing, spec.rowSpacing),
      column: c,
      digit,
    }))
  );
}

function rowCenters(x: number, y: number, count: number, config: SheetConfig): Point[] {
  return Array.from({ length: count }, (_, i) => horizontalBubbleCenter(x, y, i, config.quantityRowSpacing));
}

export function buildRecognitionManifest(layout: SheetLayout): RecognitionManifest {
  const { config, page } = layout;

  const rows = layout.products.map((product, index): ManifestRow => {
    const g = productRowGeometry(index, config, page);
    return {
      index,
      productId: product.id,
      baseline: g.baseline,
      marker: square(g.marker),
      code: square(g.code),
      tens: rowCenters(g.quantity.x, g.quantity.y, quantityFieldMap.tens.digits.length, config),
      ones: rowCenters(onesOriginX(g.quantity.x, config), g.quantity.y, quantityFieldMap.ones.digits.length, config),
    };
  });

  return {
    page: { width: page.width, height: page.height },
    bubbleRadius: config.bubbleRadius,
    cornerMarkers: cornerMarkers(config, page).map(square),
    clientCode: square(clientCodeBox(config, page)),
    dateBubbles: {
      day: dateBubbles("day", config, page),
      month: dateBubbles("month", config, page),
      year: dateBubbles("year", config, page),
    },
    rows,
  };
}

type JsonObject = { [key: string]: unknown };

function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function object(v: unknown, where: string): JsonObject {
  if (!isJsonObject(v)) throw new ValidationError(`Manifest ${where} must be an object.`);
  return v;
}

function list<T>(v: unknown, where: string, item: (entry: unknown, where: string) => T): T[] {
  if (!Array.isArray(v)) throw new ValidationError(`Manifest ${where} must be an array.`);
  return v.map((entry: unknown, i) => item(entry, `${where}[${i}]`));
}

function num(o: JsonObject, key: string, where: string): number {
  const v = o[key];
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new ValidationError(`Manifest ${where}.${key} must be a number.`);
  }
  return v;
}

function point(v: unknown, where: string): Point {
  const o = object(v, where);
  return { x: num(o, "x", where), y: num(o, "y", where) };
}

function box(v: unknown, where: string): Box {
  const o = object(v, where);
  return { ...point(o, where), width: num(o, "width", where), height: num(o, "height", where) };
}

function dateBubble(v: unknown, where: string): DateBubble {
  const o = object(v, where);
  return { ...point(o, where), column: num(o, "column", where), digit: num(o, "digit", where) };
}

function row(v: unknown, where: string): ManifestRow {
  const o = object(v, where);
  const productId = o.productId;
  if (typeof productId !== "string") {
    throw new ValidationError(`Manifest ${where}.productId must be a string.`);
  }
  return {
    index: num(o, "index", where),
    productId,
    baseline: num(o, "baseline", where),
    marker: box(o.marker, `${where}.marker`),
    code: box(o.code, `${where}.code`),
    tens: list(o.tens, `${where}.tens`, point),
    ones: list(o.ones, `${where}.ones`, point),
  };
}

/** Checks a manifest read back from JSON, as written by `generate.ts --manifest`. */
export function parseRecognitionManifest(raw: unknown): RecognitionManifest {
  const o = object(raw, "root");
  const page = object(o.page, "page");
  const dates = object(o.dateBubbles, "dateBubbles");
  return {
    page: { width: num(page, "width", "page"), height: num(page, "height", "page") },
    bubbleRadius: num(o, "bubbleRadius", "root"),
    cornerMarkers: list(o.cornerMarkers, "cornerMarkers", box),
    clientCode: box(o.clientCode, "clientCode"),
    dateBubbles: {
      day: list(dates.day, "dateBubbles.day", dateBubble),
      month: list(dates.month, "dateBubbles.month", dateBubble),
      year: list(dates.year, "dateBubbles.year", dateBubble),
    },
    rows: list(o.rows, "rows", row),
  };
}

export async function loadRecognitionManifest(filePath: string): Promise<RecognitionManifest> {
  return parseRecognitionManifest(await readJsonFile(filePath));
}

import { layoutDateFields } from "./dateField.ts";
import { commandsExtent, type DrawCommand, type MarkerCommand } from "./drawCommands.ts";
import { LayoutOverflowError, ValidationError } from "./errors.ts";
import { layoutProductRow, productSectionStart, rowBaseline, type Product } from "./productRow.ts";
import { a4Page, defaultSheetConfig, resolveSheetConfig, type PageGeometry, type SheetConfig } from "./sheetConfig.ts";

export type ClientRecord = {
  name: string;
  id: string; // QR payload
};

export type SheetLayout = {
  page: PageGeometry;
  config: SheetConfig;
  client: ClientRecord;
  products: readonly Product[];
  commands: DrawCommand[];
};

const CLIENT_X = 50;
const CLIENT_DROP = 50;        // page top -> client label baseline
const CLIENT_FONT_SIZE = 14;
const CLIENT_CODE_DROP = 85;   // client label baseline -> QR bottom
const DATE_X = 300;
const DATE_DROP = 50;

/** Bottom-left, top-left, top-right. The empty bottom-right corner tells a scanner which way is up. */
export function cornerMarkers(config: SheetConfig, page: PageGeometry = a4Page): MarkerCommand[] {
  const m = config.markerSize;
  return [
    { kind: "marker", x: 0, y: 0, size: m },
    { kind: "marker", x: 0, y: page.height - m, size: m },
    { kind: "marker", x: page.width - m, y: page.height - m, size: m },
  ];
}

export function clientCodeBox(config: SheetConfig, page: PageGeometry = a4Page) {
  return {
    x: CLIENT_X,
    y: page.height - CLIENT_DROP - CLIENT_CODE_DROP,
    size: config.codeSize * config.clientCodeScale,
  };
}

export function dateSectionOrigin(page: PageGeometry = a4Page): { x: number; y: number } {
  return { x: DATE_X, y: page.height - DATE_DROP };
}

function layoutHeader(client: ClientRecord, config: SheetConfig, page: PageGeometry): DrawCommand[] {
  const labelY = page.height - CLIENT_DROP;
  const date = dateSectionOrigin(page);
  return [
    { kind: "text", x: CLIENT_X, y: labelY, text: `Client: ${client.name}`, weight: "bold", size: CLIENT_FONT_SIZE, align: "left" },
    { kind: "image", ...clientCodeBox(config, page), payload: client.id },
    ...layoutDateFields(date.x, date.y, config),
  ];
}

// Every row has the same content relative to its baseline, so row 0 stands in for all.
function rowExtentBelowBaseline(config: SheetConfig, page: PageGeometry) {
  const extent = commandsExtent(layoutProductRow({ name: "", id: "" }, 0, config, page));
  const baseline = rowBaseline(0, config, page);
  return extent
    ? { below: baseline - extent.bottom, above: extent.top - baseline }
    : { below: 0, above: 0 };
}

/**
 * Rejects configurations whose rows would collide with each other or with the
 * header, or whose bubbles, markers or codes leave the page horizontally.
 */
export function validateSheetGeometry(config: SheetConfig, page: PageGeometry = a4Page): void {
  resolveSheetConfig(config);

  const row = rowExtentBelowBaseline(config, page);
  const rowHeight = row.below + row.above;
  if (config.rowSpacing < rowHeight) {
    throw new ValidationError(
      `Row spacing ${config.rowSpacing} is smaller than the row content height ${rowHeight.toFixed(2)}.`
    );
  }

  const header = commandsExtent(layoutHeader({ name: "", id: "" }, config, page));
  const firstRowTop = productSectionStart(page) + row.above;
  if (header && firstRowTop >= header.bottom) {
    throw new ValidationError(
      `First product row (top ${firstRowTop.toFixed(2)}) overlaps the header (bottom ${header.bottom.toFixed(2)}).`
    );
  }

  const shapes = [
    ...layoutHeader({ name: "", id: "" }, config, page),
    ...layoutProductRow({ name: "", id: "" }, 0, config, page),
  ];
  for (const cmd of shapes) {
    const [left, right] =
      cmd.kind === "circle" ? [cmd.x - cmd.radius, cmd.x + cmd.radius]
      : cmd.kind === "text" ? [cmd.x, cmd.x]
      : [cmd.x, cmd.x + cmd.size];
    if (left < 0 || right > page.width) {
      throw new ValidationError(`A ${cmd.kind} at x=${cmd.x.toFixed(2)} does not fit the page width ${page.width}.`);
    }
  }
}

/** How many rows fit with their lowest point at or above the bottom marker band. */
export function productCapacity(config: SheetConfig, page: PageGeometry = a4Page): number {
  const { below } = rowExtentBelowBaseline(config, page);
  const room = productSectionStart(page) - below - config.markerSize;
  return room < 0 ? 0 : Math.floor(room / config.rowSpacing) + 1;
}

/**
 * Full page in paint order: corner markers, client section, date section,
 * then one row per product in input order.
 */
export function layoutDocument(
  client: ClientRecord,
  products: readonly Product[],
  config: SheetConfig = defaultSheetConfig,
  page: PageGeometry = a4Page
): SheetLayout {
  validateSheetGeometry(config, page);

  const capacity = productCapacity(config, page);
  if (products.length > capacity) {
    throw new LayoutOverflowError(products.length, capacity);
  }

  const commands: DrawCommand[] = [
    ...cornerMarkers(config, page),
    ...layoutHeader(client, config, page),
    ...products.flatMap((product, index) => layoutProductRow(product, index, config, page)),
  ];

  return { page, config, client, products, commands };
}

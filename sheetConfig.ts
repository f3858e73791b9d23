// sheetConfig.ts
import { PageSizes } from "pdf-lib";

import { ValidationError } from "./errors.ts";

/**
 * Geometry shared by every layout call. All values are PDF points:
 * - origin (0,0) is bottom-left
 * - 1 point = 1/72 inch
 */
export type SheetConfig = {
  readonly bubbleRadius: number;
  readonly columnSpacing: number;   // between date digit columns
  readonly digitRowSpacing: number; // between date bubbles in one column
  readonly rowSpacing: number;      // between product rows
  readonly fieldGap: number;        // between Day / Month / Year
  readonly markerSize: number;
  readonly quantityRowSpacing: number; // between Tens/Ones bubble centers
  readonly quantityFieldGap: number;   // extra gap between Tens and Ones
  readonly codeSize: number;           // unscaled QR side
  readonly clientCodeScale: number;
  readonly productCodeScale: number;
};

export type PageGeometry = {
  readonly width: number;
  readonly height: number;
};

const MM = 72 / 25.4;

export const a4Page: PageGeometry = Object.freeze({
  width: PageSizes.A4[0],
  height: PageSizes.A4[1],
});

export const defaultSheetConfig: SheetConfig = Object.freeze({
  bubbleRadius: 4,
  columnSpacing: 30,
  digitRowSpacing: 12,
  rowSpacing: 30,
  fieldGap: 100,
  markerSize: 10,
  quantityRowSpacing: 15,
  quantityFieldGap: 10,
  codeSize: 32 * MM,
  clientCodeScale: 1,
  productCodeScale: 0.3,
});

const configKeys = [
  "bubbleRadius",
  "columnSpacing",
  "digitRowSpacing",
  "rowSpacing",
  "fieldGap",
  "markerSize",
  "quantityRowSpacing",
  "quantityFieldGap",
  "codeSize",
  "clientCodeScale",
  "productCodeScale",
] as const satisfies ReadonlyArray<keyof SheetConfig>;

function isConfigKey(key: string): key is keyof SheetConfig {
  return configKeys.some((k) => k === key);
}

/** Merge overrides onto the defaults and reject anything that is not a positive number. */
export function resolveSheetConfig(overrides: Partial<SheetConfig> = {}): SheetConfig {
  const merged: SheetConfig = { ...defaultSheetConfig, ...overrides };
  for (const key of configKeys) {
    const value = merged[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(`Sheet config "${key}" must be a positive number (got ${value}).`);
    }
  }
  return Object.freeze(merged);
}

/** Parse overrides from untrusted JSON (e.g. a --config file). */
export function parseSheetConfig(raw: unknown): SheetConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ValidationError("Sheet config must be a JSON object.");
  }
  const overrides: { -readonly [K in keyof SheetConfig]?: number } = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      throw new ValidationError(`Unknown sheet config key "${key}".`);
    }
    if (typeof value !== "number") {
      throw new ValidationError(`Sheet config "${key}" must be a number.`);
    }
    overrides[key] = value;
  }
  return resolveSheetConfig(overrides);
}

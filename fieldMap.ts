// fieldMap.ts
import { ValidationError } from "./errors.ts";

/** Allowed digits for one column of a multi-digit field. */
export type DigitColumnSpec = readonly number[];

export type VerticalFieldSpec = {
  orientation: "vertical";
  label: string;
  columns: readonly DigitColumnSpec[];
  radius: number;
  columnSpacing: number;
  rowSpacing: number;
};

export type HorizontalFieldSpec = {
  orientation: "horizontal";
  label: string;     // reserved; not drawn
  digits: DigitColumnSpec;
  radius: number;
  spacing: number;
};

export type BubbleFieldSpec = VerticalFieldSpec | HorizontalFieldSpec;

export const ALL_DIGITS: DigitColumnSpec = Object.freeze([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);

export type DateFieldName = "day" | "month" | "year";
export type QuantityFieldName = "tens" | "ones";

export type DateFieldEntry = { label: string; columns: readonly DigitColumnSpec[] };

// Leading-digit domains keep impossible days (4x-9x) and months (2x-9x) off the sheet.
export const dateFieldMap: Readonly<Record<DateFieldName, DateFieldEntry>> = {
  day:   { label: "Day",   columns: [[0, 1, 2, 3], ALL_DIGITS] },
  month: { label: "Month", columns: [[0, 1], ALL_DIGITS] },
  year:  { label: "Year",  columns: [ALL_DIGITS, ALL_DIGITS] },
};

export const dateFieldOrder: readonly DateFieldName[] = ["day", "month", "year"];

export const quantityFieldMap: Readonly<Record<QuantityFieldName, { label: string; digits: DigitColumnSpec }>> = {
  tens: { label: "Tens", digits: ALL_DIGITS },
  ones: { label: "Ones", digits: ALL_DIGITS },
};

export function validateDigitColumn(label: string, digits: DigitColumnSpec): void {
  const seen = new Set<number>();
  for (const d of digits) {
    if (!Number.isInteger(d) || d < 0 || d > 9) {
      throw new ValidationError(`Field "${label}": digit ${d} is outside 0-9.`);
    }
    if (seen.has(d)) {
      throw new ValidationError(`Field "${label}": digit ${d} appears twice in one column.`);
    }
    seen.add(d);
  }
}

export function validateFieldSpec(spec: BubbleFieldSpec): void {
  if (!(spec.radius > 0)) {
    throw new ValidationError(`Field "${spec.label}": bubble radius must be positive.`);
  }
  if (spec.orientation === "vertical") {
    if (spec.columns.length === 0) {
      throw new ValidationError(`Field "${spec.label}": needs at least one digit column.`);
    }
    spec.columns.forEach((column) => validateDigitColumn(spec.label, column));
  } else {
    validateDigitColumn(spec.label, spec.digits);
  }
}

/** Descending copy: the largest digit sits nearest the label. */
export function descendingDigits(column: DigitColumnSpec): number[] {
  return [...column].sort((a, b) => b - a);
}

/** Every two-digit value a vertical field can express, as zero-padded strings. */
export function representableValues(columns: readonly DigitColumnSpec[]): string[] {
  return columns.reduce<string[]>(
    (acc, column) => acc.flatMap((prefix) => [...column].sort((a, b) => a - b).map((d) => prefix + d)),
    [""]
  );
}

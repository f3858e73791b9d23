import type { CircleCommand, DrawCommand, TextCommand } from "./drawCommands.ts";
import {
  descendingDigits,
  validateDigitColumn,
  validateFieldSpec,
  type BubbleFieldSpec,
  type DigitColumnSpec,
} from "./fieldMap.ts";

/** Distance from a field's origin (its label baseline) down to the first bubble row. */
export const LABEL_DROP = 15;

const DIGIT_FONT_SIZE = 8;
const DIGIT_GAP = 2;          // circle edge -> digit text (vertical mode)
const DIGIT_BELOW_GAP = 8;    // circle bottom -> digit baseline (horizontal mode)

/** Center of the bubble at `rowIndex` (0 = largest digit) of column `colIndex`. */
export function verticalBubbleCenter(
  originX: number,
  originY: number,
  colIndex: number,
  rowIndex: number,
  colSpacing: number,
  rowSpacing: number
): { x: number; y: number } {
  return { x: originX + colIndex * colSpacing, y: originY - LABEL_DROP - rowIndex * rowSpacing };
}

/** Center of the `i`-th bubble of a horizontal row. */
export function horizontalBubbleCenter(originX: number, originY: number, i: number, spacing: number): { x: number; y: number } {
  return { x: originX + i * spacing, y: originY - LABEL_DROP };
}

function circle(x: number, y: number, radius: number): CircleCommand {
  return { kind: "circle", x, y, radius };
}

function digitText(x: number, y: number, digit: number, align: "left" | "center"): TextCommand {
  return { kind: "text", x, y, text: String(digit), weight: "bold", size: DIGIT_FONT_SIZE, align };
}

/**
 * One labeled field as stacked digit columns, e.g. the "Day" field:
 *
 *   Day:
 *   (3)3  (9)9
 *   (2)2  (8)8
 *   ...
 *
 * Column i sits at originX + i*colSpacing; within a column the digits run
 * largest-first from originY - 15 downwards. Columns with fewer digits stay short.
 */
export function renderVerticalColumns(
  originX: number,
  originY: number,
  label: string,
  columns: readonly DigitColumnSpec[],
  radius: number,
  colSpacing: number,
  rowSpacing: number
): DrawCommand[] {
  columns.forEach((column) => validateDigitColumn(label, column));

  const commands: DrawCommand[] = [
    { kind: "text", x: originX, y: originY, text: `${label}:`, weight: "bold", size: DIGIT_FONT_SIZE, align: "left" },
  ];
  columns.forEach((column, colIndex) => {
    descendingDigits(column).forEach((digit, rowIndex) => {
      const { x, y } = verticalBubbleCenter(originX, originY, colIndex, rowIndex, colSpacing, rowSpacing);
      commands.push(circle(x, y, radius));
      commands.push(digitText(x + radius + DIGIT_GAP, y - radius / 2, digit, "left"));
    });
  });

  return commands;
}

/**
 * One row of bubbles with the digit centered below each. `label` is reserved:
 * the space above the row is left blank.
 */
export function renderHorizontalRow(
  originX: number,
  originY: number,
  label: string,
  allowedDigits: DigitColumnSpec,
  radius: number,
  spacing: number
): DrawCommand[] {
  validateDigitColumn(label, allowedDigits);

  const commands: DrawCommand[] = [];

  allowedDigits.forEach((digit, i) => {
    const { x, y } = horizontalBubbleCenter(originX, originY, i, spacing);
    commands.push(circle(x, y, radius));
    commands.push(digitText(x, y - radius - DIGIT_BELOW_GAP, digit, "center"));
  });

  return commands;
}

export function renderField(originX: number, originY: number, spec: BubbleFieldSpec): DrawCommand[] {
  validateFieldSpec(spec);
  return spec.orientation === "vertical"
    ? renderVerticalColumns(originX, originY, spec.label, spec.columns, spec.radius, spec.columnSpacing, spec.rowSpacing)
    : renderHorizontalRow(originX, originY, spec.label, spec.digits, spec.radius, spec.spacing);
}

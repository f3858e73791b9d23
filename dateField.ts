import { renderField } from "./bubbleGrid.ts";
import type { DrawCommand } from "./drawCommands.ts";
import { dateFieldMap, dateFieldOrder, type DateFieldName, type VerticalFieldSpec } from "./fieldMap.ts";
import type { SheetConfig } from "./sheetConfig.ts";

export function dateFieldSpec(name: DateFieldName, config: SheetConfig): VerticalFieldSpec {
  const entry = dateFieldMap[name];
  return {
    orientation: "vertical",
    label: entry.label,
    columns: entry.columns,
    radius: config.bubbleRadius,
    columnSpacing: config.columnSpacing,
    rowSpacing: config.digitRowSpacing,
  };
}

/** Origin of each date field: Day at x, Month at x + gap, Year at x + 2*gap. */
export function dateFieldOrigins(x: number, y: number, config: SheetConfig): Record<DateFieldName, { x: number; y: number }> {
  return {
    day: { x, y },
    month: { x: x + config.fieldGap, y },
    year: { x: x + 2 * config.fieldGap, y },
  };
}

export function layoutDateFields(x: number, y: number, config: SheetConfig): DrawCommand[] {
  const origins = dateFieldOrigins(x, y, config);
  return dateFieldOrder.flatMap((name) =>
    renderField(origins[name].x, origins[name].y, dateFieldSpec(name, config))
  );
}

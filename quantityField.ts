import { renderField } from "./bubbleGrid.ts";
import type { DrawCommand } from "./drawCommands.ts";
import { quantityFieldMap, type HorizontalFieldSpec, type QuantityFieldName } from "./fieldMap.ts";
import type { SheetConfig } from "./sheetConfig.ts";

export function quantityFieldSpec(name: QuantityFieldName, config: SheetConfig): HorizontalFieldSpec {
  const entry = quantityFieldMap[name];
  return {
    orientation: "horizontal",
    label: entry.label,
    digits: entry.digits,
    radius: config.bubbleRadius,
    spacing: config.quantityRowSpacing,
  };
}

/** Ones starts right after the ten Tens bubbles plus the inter-field gap. */
export function onesOriginX(tensOriginX: number, config: SheetConfig): number {
  return tensOriginX + 10 * config.quantityRowSpacing + config.quantityFieldGap;
}

/**
 * Tens then Ones, each a full 0-9 row. The two rows are marked independently;
 * a reader combines them as tens*10 + ones.
 */
export function layoutQuantityField(x: number, y: number, config: SheetConfig): DrawCommand[] {
  return [
    ...renderField(x, y, quantityFieldSpec("tens", config)),
    ...renderField(onesOriginX(x, config), y, quantityFieldSpec("ones", config)),
  ];
}

import { describe, expect, it } from "vitest";

import type { DrawCommand } from "./drawCommands.ts";
import { layoutQuantityField, onesOriginX } from "./quantityField.ts";
import { defaultSheetConfig } from "./sheetConfig.ts";

const circleXs = (cmds: DrawCommand[]) => cmds.flatMap((c) => (c.kind === "circle" ? [c.x] : []));

describe("layoutQuantityField", () => {
  it("starts Ones after ten Tens bubbles and the field gap", () => {
    expect(onesOriginX(200, defaultSheetConfig)).toBe(360);
  });

  it("draws Tens then Ones, ten bubbles each", () => {
    const cmds = layoutQuantityField(200, 100, defaultSheetConfig);
    expect(circleXs(cmds)).toEqual([
      200, 215, 230, 245, 260, 275, 290, 305, 320, 335,
      360, 375, 390, 405, 420, 435, 450, 465, 480, 495,
    ]);
    expect(cmds.every((c) => c.kind !== "circle" || c.y === 85)).toBe(true);
  });

  it("labels both rows 0-9 and nothing else", () => {
    const labels = layoutQuantityField(0, 0, defaultSheetConfig).flatMap((c) => (c.kind === "text" ? [c.text] : []));
    expect(labels.join("")).toBe("01234567890123456789");
  });
});

import { describe, expect, it } from "vitest";

import { layoutDateFields } from "./dateField.ts";
import type { CircleCommand, DrawCommand } from "./drawCommands.ts";
import { defaultSheetConfig } from "./sheetConfig.ts";

const circles = (cmds: DrawCommand[]): CircleCommand[] =>
  cmds.flatMap((c) => (c.kind === "circle" ? [c] : []));

describe("layoutDateFields", () => {
  const cmds = layoutDateFields(300, 700, defaultSheetConfig);

  it("places Day, Month and Year one field gap apart on the same baseline", () => {
    const labels = cmds.flatMap((c) => (c.kind === "text" && c.text.endsWith(":") ? [[c.text, c.x, c.y]] : []));
    expect(labels).toEqual([
      ["Day:", 300, 700],
      ["Month:", 400, 700],
      ["Year:", 500, 700],
    ]);
  });

  it("draws 4+10, 2+10 and 10+10 bubbles", () => {
    const all = circles(cmds);
    expect(all).toHaveLength(46);
    expect(all.filter((c) => c.x === 300)).toHaveLength(4);
    expect(all.filter((c) => c.x === 330)).toHaveLength(10);
    expect(all.filter((c) => c.x === 400)).toHaveLength(2);
    expect(all.filter((c) => c.x === 430)).toHaveLength(10);
    expect(all.filter((c) => c.x === 500)).toHaveLength(10);
    expect(all.filter((c) => c.x === 530)).toHaveLength(10);
  });

  it("puts the month's leading 1 above its 0", () => {
    const leading = cmds.flatMap((c) => (c.kind === "text" && c.x === 406 ? [[c.text, c.y]] : []));
    expect(leading).toEqual([
      ["1", 683],
      ["0", 671],
    ]);
  });

  it("follows the configured spacing", () => {
    const wide = layoutDateFields(0, 0, { ...defaultSheetConfig, fieldGap: 120, columnSpacing: 40 });
    const xs = [...new Set(circles(wide).map((c) => c.x))];
    expect(xs).toEqual([0, 40, 120, 160, 240, 280]);
  });
});

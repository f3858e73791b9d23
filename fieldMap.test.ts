import { describe, expect, it } from "vitest";

import { ValidationError } from "./errors.ts";
import {
  dateFieldMap,
  descendingDigits,
  quantityFieldMap,
  representableValues,
  validateFieldSpec,
} from "./fieldMap.ts";

describe("date field domains", () => {
  it("day covers exactly 00-39", () => {
    const values = representableValues(dateFieldMap.day.columns);
    expect(values).toHaveLength(40);
    expect(values[0]).toBe("00");
    expect(values[39]).toBe("39");
    expect(values).toContain("32");
    expect(values).not.toContain("40");
  });

  it("month covers exactly 00-19", () => {
    const values = representableValues(dateFieldMap.month.columns);
    expect(values).toHaveLength(20);
    expect(values[19]).toBe("19");
  });

  it("year covers 00-99", () => {
    expect(representableValues(dateFieldMap.year.columns)).toHaveLength(100);
  });
});

describe("quantity fields", () => {
  it("both rows offer all ten digits", () => {
    expect(quantityFieldMap.tens.digits).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(quantityFieldMap.ones.digits).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});

describe("descendingDigits", () => {
  it("sorts a copy", () => {
    const column = [0, 1, 2, 3];
    expect(descendingDigits(column)).toEqual([3, 2, 1, 0]);
    expect(column).toEqual([0, 1, 2, 3]);
  });
});

describe("validateFieldSpec", () => {
  it("needs at least one column in vertical mode", () => {
    expect(() =>
      validateFieldSpec({ orientation: "vertical", label: "Day", columns: [], radius: 4, columnSpacing: 30, rowSpacing: 12 })
    ).toThrow(ValidationError);
  });

  it("names the field in the error", () => {
    expect(() =>
      validateFieldSpec({ orientation: "horizontal", label: "Tens", digits: [1, 1], radius: 4, spacing: 15 })
    ).toThrow('Field "Tens": digit 1 appears twice in one column.');
  });
});

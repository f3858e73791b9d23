import { describe, expect, it } from "vitest";

import { parseGenerateArgs } from "./cliArgs.ts";

describe("parseGenerateArgs", () => {
  it("reads positionals and options in any order", () => {
    expect(
      parseGenerateArgs([
        "--client-name", "Corner Bakery", "products.json", "--client-id", "CLIENT42",
        "out.pdf", "--manifest", "out.json", "--config", "sheet.json",
      ])
    ).toEqual({
      ok: true,
      args: {
        productsPath: "products.json",
        outputPath: "out.pdf",
        clientName: "Corner Bakery",
        clientId: "CLIENT42",
        manifestPath: "out.json",
        fontPath: undefined,
        boldFontPath: undefined,
        configPath: "sheet.json",
      },
    });
  });

  it("requires both paths and a client name", () => {
    expect(parseGenerateArgs(["products.json"])).toEqual({ ok: false, error: "Missing <products.json> or <output.pdf>" });
    expect(parseGenerateArgs(["products.json", "out.pdf"])).toEqual({ ok: false, error: "Missing --client-name" });
  });

  it("rejects unknown options, missing values and extra arguments", () => {
    expect(parseGenerateArgs(["--pages", "2"])).toEqual({ ok: false, error: "Unknown option --pages" });
    expect(parseGenerateArgs(["a", "b", "--client-name"])).toEqual({ ok: false, error: "Option --client-name needs a value" });
    expect(parseGenerateArgs(["a", "b", "c", "--client-name", "X"])).toEqual({ ok: false, error: "Unexpected argument c" });
  });
});

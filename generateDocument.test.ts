import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { EncodingError, IOError, LayoutOverflowError } from "./errors.ts";
import { generateDocument } from "./generateDocument.ts";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "scantron-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("generateDocument", () => {
  it("writes the PDF and reports success", async () => {
    const outputPath = path.join(dir, "sheet.pdf");
    const result = await generateDocument("CLIENT42", "Corner Bakery", [
      { name: "A", id: "A" },
      { name: "B", id: "B" },
    ], outputPath);

    const written = await fs.readFile(outputPath);
    expect(written.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(result.byteLength).toBe(written.length);
    expect(result.productCount).toBe(2);
    expect(console.log).toHaveBeenCalledWith(`PDF generated and saved as '${outputPath}'.`);
    expect(await fs.readdir(dir)).toEqual(["sheet.pdf"]);
  });

  it("succeeds with no products", async () => {
    const outputPath = path.join(dir, "empty.pdf");
    const result = await generateDocument("CLIENT42", "Corner Bakery", [], outputPath);
    expect(result.productCount).toBe(0);
    expect(result.layout.commands.filter((c) => c.kind === "marker")).toHaveLength(3);
  });

  it("leaves nothing behind when a payload cannot be encoded", async () => {
    const outputPath = path.join(dir, "sheet.pdf");
    await expect(generateDocument("CLIENT42", "Corner Bakery", [{ name: "Blank", id: "" }], outputPath)).rejects.toThrow(
      EncodingError
    );
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("refuses more products than fit on the page", async () => {
    const products = Array.from({ length: 22 }, (_, i) => ({ name: `Item ${i}`, id: `SKU-${i}` }));
    await expect(generateDocument("CLIENT42", "Corner Bakery", products, path.join(dir, "sheet.pdf"))).rejects.toThrow(
      LayoutOverflowError
    );
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("reports an unwritable path as an IOError", async () => {
    const outputPath = path.join(dir, "missing", "sheet.pdf");
    await expect(generateDocument("CLIENT42", "Corner Bakery", [], outputPath)).rejects.toMatchObject({
      name: "IOError",
      path: outputPath,
    });
    await expect(generateDocument("CLIENT42", "Corner Bakery", [], outputPath)).rejects.toThrow(IOError);
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { IOError, ValidationError } from "./errors.ts";
import { generateClientId, loadProducts, parseProducts, readJsonFile } from "./products.ts";

describe("generateClientId", () => {
  it("makes 15 uppercase letters and digits", () => {
    expect(generateClientId()).toMatch(/^[A-Z0-9]{15}$/);
  });

  it("takes a size and an alphabet", () => {
    expect(generateClientId(4, "A")).toBe("AAAA");
  });
});

describe("parseProducts", () => {
  it("keeps names and ids verbatim", () => {
    expect(parseProducts([{ name: "  Rye loaf ", id: "rye loaf" }])).toEqual([{ name: "  Rye loaf ", id: "rye loaf" }]);
  });

  it("drops unknown keys", () => {
    expect(parseProducts([{ name: "A", id: "1", price: 3 }])).toEqual([{ name: "A", id: "1" }]);
  });

  it("rejects malformed entries", () => {
    expect(() => parseProducts({ name: "A" })).toThrow("Products must be a JSON array.");
    expect(() => parseProducts(["A"])).toThrow("Product #0 must be an object.");
    expect(() => parseProducts([{ name: "A", id: "1" }, { name: "B" }])).toThrow('Product #1 needs a string "id".');
    expect(() => parseProducts([{ id: 7 }])).toThrow(ValidationError);
  });
});

describe("loading files", () => {
  it("reads the bundled example", async () => {
    const examplePath = fileURLToPath(new URL("./products.example.json", import.meta.url));
    const products = await loadProducts(examplePath);
    expect(products).toHaveLength(12);
    expect(products[0]).toEqual({ name: "Sourdough loaf", id: "SKU-1001" });
  });

  it("separates unreadable files from invalid JSON", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "scantron-"));
    try {
      const broken = path.join(dir, "broken.json");
      await fs.writeFile(broken, "[{");
      await expect(readJsonFile(broken)).rejects.toThrow(ValidationError);
      await expect(readJsonFile(path.join(dir, "absent.json"))).rejects.toThrow(IOError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

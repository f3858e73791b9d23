import { describe, expect, it } from "vitest";

import { createQrEncoder, encodeAll, type CodeImageEncoder } from "./codeImage.ts";
import { EncodingError } from "./errors.ts";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe("createQrEncoder", () => {
  it("returns a square PNG with its pixel bounds", async () => {
    const code = await createQrEncoder().encode("SKU-1");
    expect([...code.png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
    // version 1 symbol: 21 modules + 4 quiet modules each side, 8px per module
    expect(code.width).toBe(232);
    expect(code.height).toBe(232);
  });

  it("follows the margin and scale options", async () => {
    const code = await createQrEncoder({ margin: 1, scale: 2 }).encode("SKU-1");
    expect(code.width).toBe(46);
  });

  it("rejects an empty payload", async () => {
    await expect(createQrEncoder().encode("")).rejects.toThrow(EncodingError);
  });

  it("rejects a payload too long for any QR version", async () => {
    const payload = "x".repeat(5000);
    await expect(createQrEncoder().encode(payload)).rejects.toMatchObject({
      name: "EncodingError",
      payload,
    });
  });
});

describe("encodeAll", () => {
  it("encodes each distinct payload once", async () => {
    const seen: string[] = [];
    const encoder: CodeImageEncoder = {
      async encode(payload) {
        seen.push(payload);
        return { png: new Uint8Array([payload.length]), width: 1, height: 1 };
      },
    };
    const codes = await encodeAll(encoder, ["A", "BB", "A"]);
    expect(seen).toEqual(["A", "BB"]);
    expect([...codes.keys()]).toEqual(["A", "BB"]);
  });
});

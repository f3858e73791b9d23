import crypto from "node:crypto";
import fs from "node:fs/promises";

import { IOError, ValidationError } from "./errors.ts";
import type { Product } from "./productRow.ts";

const CLIENT_ID_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/** Random client id such as "Q7ZK0M4XA91BR2C". */
export function generateClientId(size = 15, chars = CLIENT_ID_CHARS): string {
  let id = "";
  for (let i = 0; i < size; i++) {
    id += chars.charAt(crypto.randomInt(chars.length));
  }
  return id;
}

/** Products file: a JSON array of { "name": string, "id": string }. */
export function parseProducts(raw: unknown): Product[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError("Products must be a JSON array.");
  }
  return raw.map((entry: unknown, i) => {
    if (typeof entry !== "object" || entry === null) {
      throw new ValidationError(`Product #${i} must be an object.`);
    }
    const name: unknown = "name" in entry ? entry.name : undefined;
    const id: unknown = "id" in entry ? entry.id : undefined;
    if (typeof name !== "string") {
      throw new ValidationError(`Product #${i} needs a string "name".`);
    }
    if (typeof id !== "string") {
      throw new ValidationError(`Product #${i} needs a string "id".`);
    }
    return { name, id };
  });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new IOError(`Cannot read "${filePath}".`, filePath, { cause: err });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`"${filePath}" is not valid JSON.`, { cause: err });
  }
}

export async function loadProducts(filePath: string): Promise<Product[]> {
  return parseProducts(await readJsonFile(filePath));
}

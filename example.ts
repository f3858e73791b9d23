// example.ts
import path from "node:path";
import { fileURLToPath } from "node:url";

import { generateDocument } from "./generateDocument.ts";
import { generateClientId, loadProducts } from "./products.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolve files relative to this script's directory (robust)
const productsPath = path.join(__dirname, "products.example.json");
const outputPath = path.join(__dirname, "inventory_scantron.pdf");

async function main() {
  const products = await loadProducts(productsPath);

  await generateDocument(generateClientId(), "Corner Bakery", products, outputPath, {
    // optional:
    // fontPath: path.join(__dirname, "assets", "fonts", "NotoSans-Regular.ttf"),
    // textColor: { r: 0, g: 0, b: 0 },
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

import { parseGenerateArgs, USAGE } from "./cliArgs.ts";
import { generateDocument, writeFileAtomic } from "./generateDocument.ts";
import { buildRecognitionManifest } from "./manifest.ts";
import { generateClientId, loadProducts, readJsonFile } from "./products.ts";
import { defaultSheetConfig, parseSheetConfig } from "./sheetConfig.ts";

async function main() {
  const parsed = parseGenerateArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }
  const args = parsed.args;

  const products = await loadProducts(args.productsPath);
  const config = args.configPath
    ? parseSheetConfig(await readJsonFile(args.configPath))
    : defaultSheetConfig;
  const clientId = args.clientId ?? generateClientId();

  const result = await generateDocument(clientId, args.clientName, products, args.outputPath, {
    config,
    fontPath: args.fontPath,
    boldFontPath: args.boldFontPath,
  });
  console.log(`Client id: ${clientId} (${result.productCount} products, ${result.byteLength} bytes)`);

  if (args.manifestPath) {
    const manifest = buildRecognitionManifest(result.layout);
    await writeFileAtomic(args.manifestPath, new TextEncoder().encode(JSON.stringify(manifest, null, 2)));
    console.log(`Wrote manifest to: ${args.manifestPath}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

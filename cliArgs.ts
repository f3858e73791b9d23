export const USAGE =
  "Usage: tsx generate.ts <products.json> <output.pdf> --client-name <name> " +
  "[--client-id <id>] [--manifest <manifest.json>] [--font <font.ttf>] [--bold-font <font.ttf>] [--config <sheet.json>]";

export type GenerateArgs = {
  productsPath: string;
  outputPath: string;
  clientName: string;
  clientId?: string;
  manifestPath?: string;
  fontPath?: string;
  boldFontPath?: string;
  configPath?: string;
};

export type ParsedArgs = { ok: true; args: GenerateArgs } | { ok: false; error: string };

const FLAGS = {
  "--client-name": "clientName",
  "--client-id": "clientId",
  "--manifest": "manifestPath",
  "--font": "fontPath",
  "--bold-font": "boldFontPath",
  "--config": "configPath",
} as const;

type Flag = keyof typeof FLAGS;

function isFlag(arg: string): arg is Flag {
  return Object.hasOwn(FLAGS, arg);
}

export function parseGenerateArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const values: Partial<Record<(typeof FLAGS)[Flag], string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    if (!isFlag(arg)) return { ok: false, error: `Unknown option ${arg}` };
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      return { ok: false, error: `Option ${arg} needs a value` };
    }
    values[FLAGS[arg]] = value;
    i++;
  }

  const [productsPath, outputPath, ...extra] = positional;
  if (!productsPath || !outputPath) return { ok: false, error: "Missing <products.json> or <output.pdf>" };
  if (extra.length > 0) return { ok: false, error: `Unexpected argument ${extra[0]}` };
  if (values.clientName === undefined) return { ok: false, error: "Missing --client-name" };

  return {
    ok: true,
    args: {
      productsPath,
      outputPath,
      clientName: values.clientName,
      clientId: values.clientId,
      manifestPath: values.manifestPath,
      fontPath: values.fontPath,
      boldFontPath: values.boldFontPath,
      configPath: values.configPath,
    },
  };
}

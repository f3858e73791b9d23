import { PDFDocument, rgb, StandardFonts, type PDFFont, type PDFImage, type PDFPage, type RGB } from "pdf-lib";
import fontkit from "@pdf-lib/fontkit";
import fs from "node:fs/promises";

import { createQrEncoder, encodeAll, type CodeImageEncoder, type EncodedCode } from "./codeImage.ts";
import { imagePayloads, paint, type DrawingSurface, type FontWeight } from "./drawCommands.ts";
import type { SheetLayout } from "./documentLayout.ts";
import { EncodingError, IOError, ValidationError } from "./errors.ts";
import type { PageGeometry } from "./sheetConfig.ts";

/** 0..1 floats */
export type Color = { r: number; g: number; b: number };

export type RenderOptions = {
  /** .ttf/.otf for regular text (product names outside WinAnsi need one). */
  fontPath?: string;
  /** .ttf/.otf for bold text; falls back to fontPath, then Helvetica-Bold. */
  boldFontPath?: string;

  textColor?: Color;
  strokeColor?: Color;

  /** Document title metadata. */
  title?: string;

  encoder?: CodeImageEncoder;
};

const STROKE_WIDTH = 1;

async function readFontBytes(fontPath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(fontPath);
  } catch (err) {
    throw new IOError(`Cannot read font "${fontPath}".`, fontPath, { cause: err });
  }
}

async function embedFontFile(pdfDoc: PDFDocument, fontPath: string): Promise<PDFFont> {
  const bytes = await readFontBytes(fontPath);
  try {
    return await pdfDoc.embedFont(bytes);
  } catch (err) {
    throw new ValidationError(`"${fontPath}" is not a usable TTF/OTF font.`, { cause: err });
  }
}

async function embedFonts(pdfDoc: PDFDocument, options: RenderOptions): Promise<Record<FontWeight, PDFFont>> {
  if (options.fontPath || options.boldFontPath) {
    // Needed for embedding custom fonts (TTF/OTF)
    pdfDoc.registerFontkit(fontkit);
  }

  const regular = options.fontPath
    ? await embedFontFile(pdfDoc, options.fontPath)
    : await pdfDoc.embedFont(StandardFonts.Helvetica);

  const boldPath = options.boldFontPath ?? options.fontPath;
  const bold = boldPath
    ? await embedFontFile(pdfDoc, boldPath)
    : await pdfDoc.embedFont(StandardFonts.HelveticaBold);

  return { regular, bold };
}

function toRgb(c: Color | undefined): RGB {
  const { r, g, b } = c ?? { r: 0, g: 0, b: 0 };
  return rgb(r, g, b);
}

/** pdf-lib backed drawing surface for a single page. */
export class PdfSurface implements DrawingSurface<PDFImage> {
  private constructor(
    private readonly pdfDoc: PDFDocument,
    private readonly page: PDFPage,
    private readonly fonts: Record<FontWeight, PDFFont>,
    private readonly textColor: RGB,
    private readonly strokeColor: RGB
  ) {}

  static async create(geometry: PageGeometry, options: RenderOptions = {}): Promise<PdfSurface> {
    // No creation/modification dates: the same input gives the same bytes.
    const pdfDoc = await PDFDocument.create({ updateMetadata: false });
    if (options.title) pdfDoc.setTitle(options.title);

    const page = pdfDoc.addPage([geometry.width, geometry.height]);
    const fonts = await embedFonts(pdfDoc, options);
    return new PdfSurface(pdfDoc, page, fonts, toRgb(options.textColor), toRgb(options.strokeColor));
  }

  async embedCode(code: EncodedCode): Promise<PDFImage> {
    return this.pdfDoc.embedPng(code.png);
  }

  rect(x: number, y: number, width: number, height: number, filled: boolean): void {
    this.page.drawRectangle({
      x,
      y,
      width,
      height,
      color: filled ? this.strokeColor : undefined,
      borderColor: filled ? undefined : this.strokeColor,
      borderWidth: filled ? 0 : STROKE_WIDTH,
    });
  }

  circle(x: number, y: number, radius: number, stroke: boolean, filled: boolean): void {
    this.page.drawCircle({
      x,
      y,
      size: radius,
      color: filled ? this.strokeColor : undefined,
      borderColor: stroke ? this.strokeColor : undefined,
      borderWidth: stroke ? STROKE_WIDTH : 0,
    });
  }

  text(x: number, y: number, text: string, weight: FontWeight, size: number): void {
    const font = this.fonts[weight];
    this.assertEncodable(font, text);
    this.page.drawText(text, { x, y, size, font, color: this.textColor });
  }

  centeredText(x: number, y: number, text: string, weight: FontWeight, size: number): void {
    const font = this.fonts[weight];
    this.assertEncodable(font, text);
    const width = font.widthOfTextAtSize(text, size);
    this.page.drawText(text, { x: x - width / 2, y, size, font, color: this.textColor });
  }

  drawImage(image: PDFImage, x: number, y: number, size: number): void {
    this.page.drawImage(image, { x, y, width: size, height: size });
  }

  async save(): Promise<Uint8Array> {
    return this.pdfDoc.save();
  }

  private assertEncodable(font: PDFFont, text: string): void {
    try {
      font.encodeText(text);
    } catch (err) {
      throw new EncodingError(
        `Font ${font.name} cannot encode "${text}"; pass a fontPath that covers it.`,
        text,
        { cause: err }
      );
    }
  }
}

/**
 * Encode every QR payload first, then paint the layout onto a fresh page.
 * A payload the encoder rejects fails the call before anything is drawn.
 */
export async function renderSheetToPdfBytes(layout: SheetLayout, options: RenderOptions = {}): Promise<Uint8Array> {
  const encoder = options.encoder ?? createQrEncoder();
  const codes = await encodeAll(encoder, imagePayloads(layout.commands));

  const surface = await PdfSurface.create(layout.page, options);
  const images = new Map<string, PDFImage>();
  for (const [payload, code] of codes) {
    images.set(payload, await surface.embedCode(code));
  }

  paint(layout.commands, surface, images);
  return surface.save();
}

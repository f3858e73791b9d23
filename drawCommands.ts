import { EncodingError } from "./errors.ts";

export type FontWeight = "regular" | "bold";

export type MarkerCommand = { kind: "marker"; x: number; y: number; size: number };
export type CircleCommand = { kind: "circle"; x: number; y: number; radius: number };
export type TextCommand = {
  kind: "text";
  x: number;
  y: number; // baseline
  text: string;
  weight: FontWeight;
  size: number;
  align: "left" | "center";
};
/** A QR code of `payload`, `size` points square, lower-left corner at (x, y). */
export type ImageCommand = { kind: "image"; x: number; y: number; size: number; payload: string };

export type DrawCommand = MarkerCommand | CircleCommand | TextCommand | ImageCommand;

/** Helvetica ascender/descender (AFM units / 1000). */
const TEXT_ASCENT = 0.718;
const TEXT_DESCENT = 0.207;

export type VerticalExtent = { bottom: number; top: number };

export function verticalExtent(cmd: DrawCommand): VerticalExtent {
  switch (cmd.kind) {
    case "marker":
      return { bottom: cmd.y, top: cmd.y + cmd.size };
    case "circle":
      return { bottom: cmd.y - cmd.radius, top: cmd.y + cmd.radius };
    case "text":
      return { bottom: cmd.y - cmd.size * TEXT_DESCENT, top: cmd.y + cmd.size * TEXT_ASCENT };
    case "image":
      return { bottom: cmd.y, top: cmd.y + cmd.size };
  }
}

/** Union of the extents; undefined for an empty list. */
export function commandsExtent(commands: readonly DrawCommand[]): VerticalExtent | undefined {
  let extent: VerticalExtent | undefined;
  for (const cmd of commands) {
    const e = verticalExtent(cmd);
    extent = extent
      ? { bottom: Math.min(extent.bottom, e.bottom), top: Math.max(extent.top, e.top) }
      : e;
  }
  return extent;
}

/**
 * What the composition step needs from a renderer.
 * Coordinates are PDF points, origin bottom-left, y up.
 */
export interface DrawingSurface<TImage> {
  rect(x: number, y: number, width: number, height: number, filled: boolean): void;
  circle(x: number, y: number, radius: number, stroke: boolean, filled: boolean): void;
  text(x: number, y: number, text: string, weight: FontWeight, size: number): void;
  centeredText(x: number, y: number, text: string, weight: FontWeight, size: number): void;
  drawImage(image: TImage, x: number, y: number, size: number): void;
  save(): Promise<Uint8Array>;
}

/** Issue commands to the surface in list order; later commands paint over earlier ones. */
export function paint<TImage>(
  commands: readonly DrawCommand[],
  surface: DrawingSurface<TImage>,
  images: ReadonlyMap<string, TImage>
): void {
  for (const cmd of commands) {
    switch (cmd.kind) {
      case "marker":
        surface.rect(cmd.x, cmd.y, cmd.size, cmd.size, true);
        break;
      case "circle":
        surface.circle(cmd.x, cmd.y, cmd.radius, true, false);
        break;
      case "text":
        if (cmd.align === "center") {
          surface.centeredText(cmd.x, cmd.y, cmd.text, cmd.weight, cmd.size);
        } else {
          surface.text(cmd.x, cmd.y, cmd.text, cmd.weight, cmd.size);
        }
        break;
      case "image": {
        const image = images.get(cmd.payload);
        if (!image) throw new EncodingError(`No encoded image for payload "${cmd.payload}".`, cmd.payload);
        surface.drawImage(image, cmd.x, cmd.y, cmd.size);
        break;
      }
    }
  }
}

/** Distinct image payloads in first-use order. */
export function imagePayloads(commands: readonly DrawCommand[]): string[] {
  const seen = new Set<string>();
  for (const cmd of commands) {
    if (cmd.kind === "image") seen.add(cmd.payload);
  }
  return [...seen];
}

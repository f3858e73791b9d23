import QRCode, { type QRCodeErrorCorrectionLevel } from "qrcode";

import { EncodingError } from "./errors.ts";

export type EncodedCode = {
  png: Uint8Array;
  width: number;  // pixels
  height: number; // pixels
};

export interface CodeImageEncoder {
  encode(payload: string): Promise<EncodedCode>;
}

export type QrEncoderOptions = {
  errorCorrectionLevel?: QRCodeErrorCorrectionLevel;
  /** Quiet zone, in modules. */
  margin?: number;
  /** Pixels per module. */
  scale?: number;
};

export function createQrEncoder(options: QrEncoderOptions = {}): CodeImageEncoder {
  const errorCorrectionLevel = options.errorCorrectionLevel ?? "M";
  const margin = options.margin ?? 4;
  const scale = options.scale ?? 8;

  return {
    async encode(payload: string): Promise<EncodedCode> {
      if (payload.length === 0) {
        throw new EncodingError("Cannot encode an empty QR payload.", payload);
      }

      let png: Buffer;
      let modules: number;
      try {
        modules = QRCode.create(payload, { errorCorrectionLevel }).modules.size;
        png = await QRCode.toBuffer(payload, { type: "png", errorCorrectionLevel, margin, scale });
      } catch (err) {
        throw new EncodingError(`Cannot encode "${payload}" as a QR code.`, payload, { cause: err });
      }

      const side = (modules + margin * 2) * scale;
      return { png: new Uint8Array(png), width: side, height: side };
    },
  };
}

/** Encode each payload once, in order. */
export async function encodeAll(
  encoder: CodeImageEncoder,
  payloads: readonly string[]
): Promise<Map<string, EncodedCode>> {
  const encoded = new Map<string, EncodedCode>();
  for (const payload of payloads) {
    if (!encoded.has(payload)) {
      encoded.set(payload, await encoder.encode(payload));
    }
  }
  return encoded;
}

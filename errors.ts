// errors.ts
export class ScantronError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed field spec, sheet configuration, products or manifest file, or font file. */
export class ValidationError extends ScantronError {}

/** A QR payload or a piece of text cannot be represented in the output. */
export class EncodingError extends ScantronError {
  constructor(
    message: string,
    readonly payload: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class IOError extends ScantronError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class LayoutOverflowError extends ScantronError {
  constructor(readonly requested: number, readonly capacity: number) {
    super(
      `${requested} products do not fit on one page (capacity is ${capacity} rows).`
    );
  }
}

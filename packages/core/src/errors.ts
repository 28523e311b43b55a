import type { SourcePosition } from "./types.js";

export type ConversionErrorCode = "MALFORMED_XML" | "MISSING_CONTEXT" | "INVALID_NUMERAL";

/**
 * Base class for failures that abort a conversion. None of them are
 * recoverable: the caller keeps whatever records were already yielded.
 */
export abstract class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ConversionErrorCode,
    public readonly position?: SourcePosition,
  ) {
    super(position ? `${message} (line ${position.line}, column ${position.column})` : message);
    this.name = new.target.name;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      position: this.position,
    };
  }
}

export class MalformedXmlError extends ConversionError {
  constructor(message: string, position?: SourcePosition) {
    super(message, "MALFORMED_XML", position);
  }
}

export class MissingContextError extends ConversionError {
  constructor(message: string, position?: SourcePosition) {
    super(message, "MISSING_CONTEXT", position);
  }
}

export class InvalidNumeralError extends ConversionError {
  constructor(
    public readonly tag: string,
    public readonly value: string,
    position?: SourcePosition,
  ) {
    super(`Invalid number "${value}" on <${tag}>`, "INVALID_NUMERAL", position);
  }
}

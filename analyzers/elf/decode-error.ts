"use strict";

import type { ElfHeaderFieldName } from "./layout.js";

export type ElfDecodeErrorKind = "NotRecognizedFormat" | "Truncated";

export class ElfDecodeError extends Error {
  readonly kind: ElfDecodeErrorKind;
  readonly field: ElfHeaderFieldName | null;

  constructor(kind: ElfDecodeErrorKind, message: string, field: ElfHeaderFieldName | null = null) {
    super(message);
    this.name = "ElfDecodeError";
    this.kind = kind;
    this.field = field;
  }

  static notRecognized(): ElfDecodeError {
    return new ElfDecodeError("NotRecognizedFormat", "Missing \\x7FELF signature.", "magic");
  }

  static truncated(field: ElfHeaderFieldName, offset: number, width: number, available: number): ElfDecodeError {
    const end = offset + width;
    return new ElfDecodeError(
      "Truncated",
      `${field} needs bytes ${offset}..${end - 1} but only ${available} bytes are available.`,
      field
    );
  }
}

"use strict";

import { decodeElfHeader } from "./header.js";
import { ELF64_HEADER_SIZE } from "./layout.js";
import type { ElfDecodeResult, ElfFileSource } from "./types.js";

export async function parseElfHeaderFile(file: ElfFileSource): Promise<ElfDecodeResult> {
  const buffer = await file.slice(0, Math.min(file.size, ELF64_HEADER_SIZE)).arrayBuffer();
  return decodeElfHeader(new Uint8Array(buffer));
}

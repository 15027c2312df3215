"use strict";

import { ELF_MAGIC } from "./constants.js";
import { ELF64_HEADER_SIZE, elfHeaderField } from "./layout.js";
import type { ElfHeaderFieldName } from "./layout.js";
import type { ElfHeaderInit } from "./types.js";

export function encodeElfHeader(header: ElfHeaderInit): Uint8Array {
  const bytes = new Uint8Array(ELF64_HEADER_SIZE);
  const dv = new DataView(bytes.buffer);
  const little = header.dataByte !== 2;
  const at = (name: ElfHeaderFieldName): number => elfHeaderField(name).offset;

  bytes.set(ELF_MAGIC, at("magic"));
  dv.setUint8(at("classByte"), header.classByte);
  dv.setUint8(at("dataByte"), header.dataByte);
  dv.setUint8(at("headerVersion"), header.headerVersion);
  dv.setUint8(at("osAbi"), header.osAbi);
  dv.setUint8(at("abiVersion"), header.abiVersion);
  dv.setUint16(at("typeCode"), header.typeCode, little);
  dv.setUint16(at("machineCode"), header.machineCode, little);
  dv.setUint32(at("version"), header.version, little);
  dv.setBigUint64(at("entryPoint"), header.entryPoint, little);
  dv.setBigUint64(at("programHeaderOffset"), header.programHeaderOffset, little);
  dv.setBigUint64(at("sectionHeaderOffset"), header.sectionHeaderOffset, little);
  dv.setUint32(at("flags"), header.flags, little);
  dv.setUint16(at("headerSize"), header.headerSize, little);
  dv.setUint16(at("programHeaderEntrySize"), header.programHeaderEntrySize, little);
  dv.setUint16(at("programHeaderCount"), header.programHeaderCount, little);
  dv.setUint16(at("sectionHeaderEntrySize"), header.sectionHeaderEntrySize, little);
  dv.setUint16(at("sectionHeaderCount"), header.sectionHeaderCount, little);
  dv.setUint16(at("stringTableIndex"), header.stringTableIndex, little);
  return bytes;
}

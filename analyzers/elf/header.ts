"use strict";

import {
  ELF_MAGIC,
  decodeClass,
  decodeDataEncoding,
  decodeMachine,
  decodeObjectType
} from "./constants.js";
import { ElfDecodeError } from "./decode-error.js";
import { elfHeaderField } from "./layout.js";
import type { ElfHeaderFieldName } from "./layout.js";
import type { ElfDecodeResult, ElfHeader } from "./types.js";

// EI_DATA: 2 is big-endian; 1 and anything unrecognised read as little-endian.
const ELFDATA2MSB = 2;

const fieldOffset = (dv: DataView, name: ElfHeaderFieldName): number => {
  const { offset, width } = elfHeaderField(name);
  if (offset + width > dv.byteLength) throw ElfDecodeError.truncated(name, offset, width, dv.byteLength);
  return offset;
};

const checkSignature = (bytes: Uint8Array): ElfDecodeError | null => {
  const available = Math.min(bytes.byteLength, ELF_MAGIC.length);
  for (let index = 0; index < available; index += 1) {
    if (bytes[index] !== ELF_MAGIC[index]) return ElfDecodeError.notRecognized();
  }
  if (available < ELF_MAGIC.length) {
    return ElfDecodeError.truncated("magic", 0, ELF_MAGIC.length, bytes.byteLength);
  }
  return null;
};

const readHeader = (bytes: Uint8Array): ElfHeader => {
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const u8 = (name: ElfHeaderFieldName): number => dv.getUint8(fieldOffset(dv, name));
  // Class and encoding come first: the encoding decides how every later field is read.
  const classByte = u8("classByte");
  const dataByte = u8("dataByte");
  const little = dataByte !== ELFDATA2MSB;
  const u16 = (name: ElfHeaderFieldName): number => dv.getUint16(fieldOffset(dv, name), little);
  const u32 = (name: ElfHeaderFieldName): number => dv.getUint32(fieldOffset(dv, name), little);
  const u64 = (name: ElfHeaderFieldName): bigint => dv.getBigUint64(fieldOffset(dv, name), little);
  const headerVersion = u8("headerVersion");
  const osAbi = u8("osAbi");
  const abiVersion = u8("abiVersion");
  const typeCode = u16("typeCode");
  const machineCode = u16("machineCode");
  const machine = decodeMachine(machineCode);
  return {
    classByte,
    elfClass: decodeClass(classByte),
    dataByte,
    dataEncoding: decodeDataEncoding(dataByte),
    headerVersion,
    osAbi,
    abiVersion,
    typeCode,
    objectType: decodeObjectType(typeCode),
    machineCode,
    ...(machine ? { machine } : {}),
    version: u32("version"),
    entryPoint: u64("entryPoint"),
    programHeaderOffset: u64("programHeaderOffset"),
    sectionHeaderOffset: u64("sectionHeaderOffset"),
    flags: u32("flags"),
    headerSize: u16("headerSize"),
    programHeaderEntrySize: u16("programHeaderEntrySize"),
    programHeaderCount: u16("programHeaderCount"),
    sectionHeaderEntrySize: u16("sectionHeaderEntrySize"),
    sectionHeaderCount: u16("sectionHeaderCount"),
    stringTableIndex: u16("stringTableIndex")
  };
};

/**
 * Decodes the fixed 64-byte ELF64 header at the start of `bytes`.
 *
 * The signature is checked before anything else. Multi-byte fields follow the
 * byte order declared in EI_DATA. Unknown class, encoding, type and machine
 * codes are not errors; only a bad signature or a buffer that ends inside a
 * field are.
 */
export function decodeElfHeader(bytes: Uint8Array): ElfDecodeResult {
  const signatureError = checkSignature(bytes);
  if (signatureError) return { ok: false, error: signatureError };
  try {
    return { ok: true, header: Object.freeze(readHeader(bytes)) };
  } catch (error) {
    if (error instanceof ElfDecodeError) return { ok: false, error };
    throw error;
  }
}

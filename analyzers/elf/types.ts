"use strict";

import type { ElfClass, ElfDataEncoding, ElfMachine, ElfObjectType } from "./constants.js";
import type { ElfDecodeError } from "./decode-error.js";

export interface ElfHeader {
  classByte: number;
  elfClass: ElfClass;
  dataByte: number;
  dataEncoding: ElfDataEncoding;
  headerVersion: number;
  osAbi: number;
  abiVersion: number;
  typeCode: number;
  objectType: ElfObjectType;
  machineCode: number;
  machine?: ElfMachine;
  version: number;
  entryPoint: bigint;
  programHeaderOffset: bigint;
  sectionHeaderOffset: bigint;
  flags: number;
  headerSize: number;
  programHeaderEntrySize: number;
  programHeaderCount: number;
  sectionHeaderEntrySize: number;
  sectionHeaderCount: number;
  stringTableIndex: number;
}

// Raw codes only; the symbolic kinds are derived from them on decode.
export type ElfHeaderInit = Omit<ElfHeader, "elfClass" | "dataEncoding" | "objectType" | "machine">;

export type ElfDecodeResult =
  | { ok: true; header: Readonly<ElfHeader> }
  | { ok: false; error: ElfDecodeError };

export type ElfFileOutcome =
  | { status: "decoded"; path: string; header: Readonly<ElfHeader> }
  | { status: "rejected"; path: string; error: ElfDecodeError }
  | { status: "unreadable"; path: string; error: Error };

// The part of Blob the header reader touches; Node's openAsBlob and test doubles both fit.
export interface ElfFileSource {
  readonly size: number;
  slice(start?: number, end?: number): { arrayBuffer(): Promise<ArrayBuffer> };
}

"use strict";

export type ElfHeaderFieldName =
  | "magic"
  | "classByte"
  | "dataByte"
  | "headerVersion"
  | "osAbi"
  | "abiVersion"
  | "identPadding"
  | "typeCode"
  | "machineCode"
  | "version"
  | "entryPoint"
  | "programHeaderOffset"
  | "sectionHeaderOffset"
  | "flags"
  | "headerSize"
  | "programHeaderEntrySize"
  | "programHeaderCount"
  | "sectionHeaderEntrySize"
  | "sectionHeaderCount"
  | "stringTableIndex";

export interface ElfHeaderField {
  readonly name: ElfHeaderFieldName;
  readonly offset: number;
  readonly width: 1 | 2 | 4 | 7 | 8;
}

// ELF64 e_ident followed by the fixed part of Elf64_Ehdr, in file order.
const FIELD_WIDTHS: ReadonlyArray<readonly [ElfHeaderFieldName, ElfHeaderField["width"]]> = [
  ["magic", 4],
  ["classByte", 1],
  ["dataByte", 1],
  ["headerVersion", 1],
  ["osAbi", 1],
  ["abiVersion", 1],
  ["identPadding", 7],
  ["typeCode", 2],
  ["machineCode", 2],
  ["version", 4],
  ["entryPoint", 8],
  ["programHeaderOffset", 8],
  ["sectionHeaderOffset", 8],
  ["flags", 4],
  ["headerSize", 2],
  ["programHeaderEntrySize", 2],
  ["programHeaderCount", 2],
  ["sectionHeaderEntrySize", 2],
  ["sectionHeaderCount", 2],
  ["stringTableIndex", 2]
];

const buildLayout = (): readonly ElfHeaderField[] => {
  const fields: ElfHeaderField[] = [];
  let offset = 0;
  for (const [name, width] of FIELD_WIDTHS) {
    fields.push(Object.freeze({ name, offset, width }));
    offset += width;
  }
  return Object.freeze(fields);
};

export const ELF64_HEADER_LAYOUT = buildLayout();

const lastField = ELF64_HEADER_LAYOUT[ELF64_HEADER_LAYOUT.length - 1];
export const ELF64_HEADER_SIZE = lastField ? lastField.offset + lastField.width : 0;

const fieldsByName = new Map(ELF64_HEADER_LAYOUT.map(field => [field.name, field] as const));

export const elfHeaderField = (name: ElfHeaderFieldName): ElfHeaderField => {
  const field = fieldsByName.get(name);
  if (!field) throw new Error(`ELF header layout has no field named ${name}.`);
  return field;
};

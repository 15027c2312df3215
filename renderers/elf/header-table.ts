"use strict";

import { padCenter } from "../../binary-utils.js";
import { buildHeaderTable } from "../../analyzers/elf/result-table.js";
import type { HeaderFieldKey, HeaderTable } from "../../analyzers/elf/result-table.js";
import type { ElfFileOutcome } from "../../analyzers/elf/types.js";
import { formatElfValue } from "./value-format.js";
import type { ElfValueFormat } from "./value-format.js";

export interface ElfHeaderRow {
  key: HeaderFieldKey;
  label: string;
  format: ElfValueFormat;
  suffix?: string;
}

export const HEADER_ROWS: readonly ElfHeaderRow[] = [
  { key: "classByte", label: "Architecture", format: "label" },
  { key: "dataByte", label: "Endian", format: "label" },
  { key: "headerVersion", label: "ELF Header Version", format: "decimal" },
  { key: "osAbi", label: "OS ABI", format: "decimal" },
  { key: "abiVersion", label: "ABI Version", format: "decimal" },
  { key: "typeCode", label: "File Type", format: "label" },
  { key: "machineCode", label: "Machine Type", format: "label" },
  { key: "version", label: "Object File Version", format: "hex" },
  { key: "entryPoint", label: "Entry Point", format: "hex" },
  { key: "programHeaderOffset", label: "Program Header Offset", format: "hex" },
  { key: "sectionHeaderOffset", label: "Section Header Offset", format: "hex" },
  { key: "flags", label: "Flags", format: "decimal" },
  { key: "headerSize", label: "Header's Size", format: "decimal", suffix: " bytes" },
  { key: "programHeaderEntrySize", label: "Per Program Header's Size", format: "decimal", suffix: " bytes" },
  { key: "programHeaderCount", label: "Program Header's Number", format: "decimal" },
  { key: "sectionHeaderEntrySize", label: "Per Section Header's Size", format: "decimal", suffix: " bytes" },
  { key: "sectionHeaderCount", label: "Section Header's Number", format: "decimal" },
  { key: "stringTableIndex", label: "Entry Index", format: "decimal" }
];

const LABEL_WIDTH = 50;
const TITLE_WIDTH = LABEL_WIDTH + " = ".length;
const CELL_WIDTH = 30;

const renderTitle = (files: string[]): string =>
  (padCenter("File", TITLE_WIDTH) + files.map(file => padCenter(file, CELL_WIDTH)).join("")).trimEnd();

function renderRows(table: HeaderTable, out: string[]): void {
  for (const row of HEADER_ROWS) {
    const values = table.columns.get(row.key) ?? [];
    if (values.every(value => value === null)) continue;
    const cells = values.map(value => formatElfValue(row.key, value, row.format, row.suffix).padEnd(CELL_WIDTH));
    out.push(`${row.label.padEnd(LABEL_WIDTH)} = ${cells.join("")}`.trimEnd());
  }
}

const describeFailure = (outcome: ElfFileOutcome): string | null => {
  if (outcome.status === "unreadable") return `${outcome.path} could not be read: ${outcome.error.message}`;
  if (outcome.status !== "rejected") return null;
  return outcome.error.kind === "NotRecognizedFormat"
    ? `${outcome.path} is not a recognized format`
    : `${outcome.path} is truncated: ${outcome.error.message}`;
};

export function renderElfHeaderReport(outcomes: readonly ElfFileOutcome[]): string[] {
  const out: string[] = [];
  const table = buildHeaderTable(outcomes, HEADER_ROWS.map(row => row.key));
  if (table.files.length) {
    out.push(renderTitle(table.files));
    renderRows(table, out);
  }
  for (const outcome of outcomes) {
    const line = describeFailure(outcome);
    if (line) out.push(line);
  }
  return out;
}

"use strict";

import type { ElfFileOutcome, ElfHeader } from "./types.js";

export type HeaderFieldKey = Exclude<
  keyof ElfHeader,
  "elfClass" | "dataEncoding" | "objectType" | "machine"
>;

export type HeaderFieldValue = number | bigint;

export interface HeaderTable {
  files: string[];
  columns: Map<HeaderFieldKey, Array<HeaderFieldValue | null>>;
}

const slotValue = (header: Readonly<ElfHeader>, key: HeaderFieldKey): HeaderFieldValue | null =>
  key === "machineCode" && header.machine === undefined ? null : header[key];

export function buildHeaderTable(
  outcomes: readonly ElfFileOutcome[],
  keys: readonly HeaderFieldKey[]
): HeaderTable {
  const table: HeaderTable = { files: [], columns: new Map() };
  for (const key of keys) table.columns.set(key, []);
  for (const outcome of outcomes) {
    if (outcome.status !== "decoded") continue;
    table.files.push(outcome.path);
    for (const [key, values] of table.columns) {
      values.push(slotValue(outcome.header, key));
    }
  }
  return table;
}

"use strict";

import { toHex32, toHex64 } from "../../binary-utils.js";
import {
  lookupClass,
  lookupDataEncoding,
  lookupMachine,
  lookupObjectType
} from "../../analyzers/elf/constants.js";
import { elfHeaderField } from "../../analyzers/elf/layout.js";
import type { HeaderFieldKey, HeaderFieldValue } from "../../analyzers/elf/result-table.js";

export type ElfValueFormat = "decimal" | "hex" | "label";

const LABELS: Partial<Record<HeaderFieldKey, (code: number) => string | null>> = {
  classByte: lookupClass,
  dataByte: lookupDataEncoding,
  typeCode: lookupObjectType,
  machineCode: lookupMachine
};

// Hex digits follow the on-disk width, so a u16 prints as 0x0040 and a u64 as 16 digits.
export const formatElfHex = (key: HeaderFieldKey, value: HeaderFieldValue): string => {
  const digits = elfHeaderField(key).width * 2;
  return typeof value === "bigint" ? toHex64(value, digits) : toHex32(value, digits);
};

export const formatElfLabel = (key: HeaderFieldKey, value: HeaderFieldValue): string => {
  const lookup = LABELS[key];
  if (!lookup || typeof value === "bigint") return value.toString();
  return lookup(value) ?? "";
};

export const formatElfValue = (
  key: HeaderFieldKey,
  value: HeaderFieldValue | null,
  format: ElfValueFormat,
  suffix = ""
): string => {
  if (value === null) return "";
  if (format === "hex") return formatElfHex(key, value) + suffix;
  if (format === "label") return formatElfLabel(key, value) + suffix;
  return value.toString() + suffix;
};

"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const toHex64 = (value: bigint | number, width = 0): string =>
  "0x" + value.toString(16).padStart(width, "0");

export const padCenter = (text: string, width: number): string => {
  const room = width - text.length;
  if (room <= 0) return text;
  const left = Math.floor(room / 2);
  return " ".repeat(left) + text + " ".repeat(room - left);
};

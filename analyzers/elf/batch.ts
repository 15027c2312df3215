"use strict";

import { parseElfHeaderFile } from "./index.js";
import type { ElfFileOutcome, ElfFileSource } from "./types.js";

export type ElfFileOpener = (path: string) => Promise<ElfFileSource>;

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

async function inspectElfFile(path: string, open: ElfFileOpener): Promise<ElfFileOutcome> {
  try {
    const result = await parseElfHeaderFile(await open(path));
    return result.ok
      ? { status: "decoded", path, header: result.header }
      : { status: "rejected", path, error: result.error };
  } catch (error) {
    return { status: "unreadable", path, error: toError(error) };
  }
}

export async function inspectElfFiles(
  paths: readonly string[],
  open: ElfFileOpener
): Promise<ElfFileOutcome[]> {
  const outcomes: ElfFileOutcome[] = [];
  for (const path of paths) {
    outcomes.push(await inspectElfFile(path, open));
  }
  return outcomes;
}

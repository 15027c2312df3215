"use strict";

import { inspectElfFiles } from "./analyzers/elf/batch.js";
import type { ElfFileOpener } from "./analyzers/elf/batch.js";
import { renderElfHeaderReport } from "./renderers/elf/header-table.js";

export interface CliIo {
  open: ElfFileOpener;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const USAGE = "Usage: elf-header-compare <file>...";

export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  if (!argv.length) {
    io.stderr(USAGE);
    return 2;
  }
  const outcomes = await inspectElfFiles(argv, io.open);
  for (const line of renderElfHeaderReport(outcomes)) io.stdout(line);
  return outcomes.every(outcome => outcome.status === "decoded") ? 0 : 1;
}

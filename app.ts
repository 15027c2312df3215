#!/usr/bin/env node
"use strict";

import { openAsBlob } from "node:fs";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    open: path => openAsBlob(path),
    stdout: line => console.log(line),
    stderr: line => console.error(line)
  });
}

void main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});

"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { USAGE, runCli } from "../../cli.js";
import type { CliIo } from "../../cli.js";
import { HEADER_ROWS } from "../../renderers/elf/header-table.js";
import { buildElfHeaderBytes, sampleHeaderInit, withCorruptedSignature } from "../fixtures/elf-header-fixtures.js";
import { createMockOpener } from "../helpers/mock-file.js";

const captureIo = (files: Record<string, Uint8Array>) => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIo = {
    open: createMockOpener(files),
    stdout: line => stdout.push(line),
    stderr: line => stderr.push(line)
  };
  return { io, stdout, stderr };
};

void test("runCli tabulates two ELF files and reports the third separately", async () => {
  const { io, stdout, stderr } = captureIo({
    "bin/ls": buildElfHeaderBytes(),
    "lib/libc.so.6": buildElfHeaderBytes(sampleHeaderInit({ typeCode: 3 })),
    "README": withCorruptedSignature(buildElfHeaderBytes())
  });
  const code = await runCli(["bin/ls", "README", "lib/libc.so.6"], io);

  assert.equal(code, 1);
  assert.deepEqual(stderr, []);
  assert.equal(stdout.length, 1 + HEADER_ROWS.length + 1);
  assert.ok(stdout[0]?.includes("bin/ls"));
  assert.ok(stdout[0]?.includes("lib/libc.so.6"));
  assert.equal(stdout[0]?.includes("README"), false);
  assert.equal(stdout.at(-1), "README is not a recognized format");
});

void test("runCli exits cleanly when every file decodes", async () => {
  const { io, stdout } = captureIo({ "a.out": buildElfHeaderBytes() });
  assert.equal(await runCli(["a.out"], io), 0);
  assert.equal(stdout.length, 1 + HEADER_ROWS.length);
});

void test("runCli prints usage without arguments", async () => {
  const { io, stdout, stderr } = captureIo({});
  assert.equal(await runCli([], io), 2);
  assert.deepEqual(stdout, []);
  assert.deepEqual(stderr, [USAGE]);
});

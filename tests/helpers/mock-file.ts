"use strict";

import type { ElfFileOpener } from "../../analyzers/elf/batch.js";

export class MockFile {
  readonly bytes: Uint8Array;
  readonly name: string;
  readonly size: number;
  readonly reads: Array<[number, number]> = [];

  constructor(bytes: Uint8Array, name = "mock.bin") {
    this.bytes = bytes;
    this.name = name;
    this.size = bytes.length;
  }

  slice(start = 0, end?: number | null): { arrayBuffer(): Promise<ArrayBuffer> } {
    const clampedStart = Math.max(0, start);
    const clampedEnd = end == null ? this.size : Math.min(end, this.size);
    this.reads.push([clampedStart, clampedEnd]);
    const sliced = this.bytes.slice(clampedStart, clampedEnd);
    return { arrayBuffer: async () => sliced.buffer };
  }
}

// Paths missing from `files` fail the way fs.openAsBlob does for a missing file.
export const createMockOpener = (files: Record<string, Uint8Array>): ElfFileOpener =>
  async path => {
    const bytes = files[path];
    if (!bytes) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    return new MockFile(bytes, path);
  };

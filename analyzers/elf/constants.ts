"use strict";

export type ElfOptionEntry = readonly [code: number, kind: string, label: string];

export const ELF_MAGIC = Object.freeze([0x7f, 0x45, 0x4c, 0x46] as const);

export const ELF_CLASS = Object.freeze([
  [1, "32Bit", "32bit architecture"],
  [2, "64Bit", "64bit architecture"]
] as const satisfies readonly ElfOptionEntry[]);

export const ELF_DATA = Object.freeze([
  [1, "Little", "Little endian"],
  [2, "Big", "Big endian"]
] as const satisfies readonly ElfOptionEntry[]);

export const ELF_TYPE = Object.freeze([
  [0, "None", "No file type"],
  [1, "Relocatable", "Relocatable file"],
  [2, "Executable", "Executable file"],
  [3, "Shared", "Shared object file"],
  [4, "Core", "Core file"],
  [0xfe00, "OsSpecific", "Operating system-specific"],
  [0xfeff, "OsSpecific", "Operating system-specific"],
  [0xff00, "ProcSpecific", "Processor-specific"],
  [0xffff, "ProcSpecific", "Processor-specific"]
] as const satisfies readonly ElfOptionEntry[]);

// Partial on purpose: codes missing here decode without a machine.
export const ELF_MACHINE = Object.freeze([
  [0, "None", "None"],
  [2, "Sparc", "SPARC"],
  [3, "X86", "x86"],
  [7, "I860", "Intel 80860"],
  [8, "Mips", "MIPS"],
  [18, "Sparc32Plus", "SPARC 32+"],
  [20, "PowerPc", "PowerPC"],
  [21, "PowerPc64", "PowerPC64"],
  [40, "Arm", "ARM"],
  [50, "Ia64", "IA-64"],
  [62, "Amd64", "AMD64"],
  [183, "AArch64", "AArch64"],
  [190, "Cuda", "CUDA"],
  [224, "AmdGpu", "AMD GPU"],
  [243, "RiscV", "RISC-V"],
  [247, "Bpf", "BPF"],
  [258, "LoongArch", "LoongArch"]
] as const satisfies readonly ElfOptionEntry[]);

export type ElfClass = (typeof ELF_CLASS)[number][1] | "Unknown";
export type ElfDataEncoding = (typeof ELF_DATA)[number][1] | "Unknown";
export type ElfObjectType = (typeof ELF_TYPE)[number][1] | "Invalid";
export type ElfMachine = (typeof ELF_MACHINE)[number][1];

const findOption = <T extends ElfOptionEntry>(options: readonly T[], code: number): T | null =>
  options.find(entry => entry[0] === code) ?? null;

export const decodeClass = (code: number): ElfClass => findOption(ELF_CLASS, code)?.[1] ?? "Unknown";
export const decodeDataEncoding = (code: number): ElfDataEncoding =>
  findOption(ELF_DATA, code)?.[1] ?? "Unknown";
export const decodeObjectType = (code: number): ElfObjectType =>
  findOption(ELF_TYPE, code)?.[1] ?? "Invalid";
export const decodeMachine = (code: number): ElfMachine | null =>
  findOption(ELF_MACHINE, code)?.[1] ?? null;

export const lookupClass = (code: number): string =>
  findOption(ELF_CLASS, code)?.[2] ?? "Invalid class";
export const lookupDataEncoding = (code: number): string =>
  findOption(ELF_DATA, code)?.[2] ?? "Invalid data";
export const lookupObjectType = (code: number): string =>
  findOption(ELF_TYPE, code)?.[2] ?? "Invalid type";
export const lookupMachine = (code: number): string | null =>
  findOption(ELF_MACHINE, code)?.[2] ?? null;

export enum Opcode {
  ADD = "ADD",
  ADDI = "ADDI",
  NAND = "NAND",
  MUL = "MUL",
  LOAD = "LOAD",
  STORE = "STORE",
  BEQ = "BEQ",
  CALL = "CALL",
  RET = "RET",
}

/** Functional-unit classes; each owns one reservation station pool. */
export type UnitKind = "add" | "load" | "store" | "nand" | "mul" | "branch" | "call";

export const UNIT_KINDS: readonly UnitKind[] = ["add", "load", "store", "nand", "mul", "branch", "call"];

export const OPCODE_UNITS: Readonly<Record<Opcode, UnitKind>> = {
  [Opcode.ADD]: "add",
  [Opcode.ADDI]: "add",
  [Opcode.NAND]: "nand",
  [Opcode.MUL]: "mul",
  [Opcode.LOAD]: "load",
  [Opcode.STORE]: "store",
  [Opcode.BEQ]: "branch",
  [Opcode.CALL]: "call",
  [Opcode.RET]: "call",
};

/** CALL links through this register and RET returns through it. */
export const LINK_REGISTER = 1;

export function unitFor(opcode: Opcode): UnitKind {
  return OPCODE_UNITS[opcode];
}

export function isControl(opcode: Opcode): boolean {
  return opcode === Opcode.BEQ || opcode === Opcode.CALL || opcode === Opcode.RET;
}

export function lookupOpcode(mnemonic: string): Opcode | null {
  const upper = mnemonic.toUpperCase();
  for (const opcode of Object.values(Opcode)) {
    if (opcode === upper) return opcode;
  }
  return null;
}

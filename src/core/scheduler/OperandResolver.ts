import { OperandError } from "../exceptions/SimulationExceptions";
import type { Instruction, SourceOperand } from "../isa/Instruction";
import { LINK_REGISTER, Opcode } from "../isa/Opcodes";
import { WORD_MAX, WORD_MIN } from "../isa/Word";
import { RegisterFile } from "../state/RegisterFile";
import type { ReorderBuffer } from "./ReorderBuffer";
import { tagOf, valueOf, type AddressOperand, type Operand } from "./SchedulerTypes";

export interface ResolvedOperands {
  j: Operand | null;
  k: Operand | null;
  address: AddressOperand | null;
  target: number | null;
}

type OperandKind = SourceOperand["kind"];

const LAYOUTS: Readonly<Record<Opcode, { destination: boolean; sources: readonly OperandKind[] }>> = {
  [Opcode.ADD]: { destination: true, sources: ["register", "register"] },
  [Opcode.NAND]: { destination: true, sources: ["register", "register"] },
  [Opcode.MUL]: { destination: true, sources: ["register", "register"] },
  [Opcode.ADDI]: { destination: true, sources: ["register", "immediate"] },
  [Opcode.LOAD]: { destination: true, sources: ["memory"] },
  [Opcode.STORE]: { destination: false, sources: ["register", "memory"] },
  [Opcode.BEQ]: { destination: false, sources: ["register", "register", "target"] },
  [Opcode.CALL]: { destination: true, sources: ["target"] },
  [Opcode.RET]: { destination: false, sources: ["register"] },
};

/**
 * Turns an instruction's source operands into station operands. A register
 * with no producer yields its value; one whose producer has already written
 * yields the value from the reorder buffer; anything else carries the tag.
 */
export class OperandResolver {
  constructor(
    private readonly registers: RegisterFile,
    private readonly rob: ReorderBuffer,
  ) {}

  resolve(instruction: Instruction): ResolvedOperands {
    this.validate(instruction);

    const [first, second, third] = instruction.sources;
    const resolved: ResolvedOperands = { j: null, k: null, address: null, target: null };

    switch (instruction.opcode) {
      case Opcode.ADD:
      case Opcode.NAND:
      case Opcode.MUL:
      case Opcode.ADDI:
        resolved.j = this.operand(first);
        resolved.k = this.operand(second);
        break;
      case Opcode.LOAD:
        resolved.address = this.address(first);
        break;
      case Opcode.STORE:
        resolved.j = this.operand(first);
        resolved.address = this.address(second);
        break;
      case Opcode.BEQ:
        resolved.j = this.operand(first);
        resolved.k = this.operand(second);
        resolved.target = third.kind === "target" ? third.index : null;
        break;
      case Opcode.CALL:
        resolved.target = first.kind === "target" ? first.index : null;
        break;
      case Opcode.RET:
        resolved.j = this.operand(first);
        break;
    }

    return resolved;
  }

  lookup(register: number): Operand {
    if (register === RegisterFile.ZERO_REGISTER) return valueOf(0);

    const tag = this.registers.tag(register);
    if (tag === null) return valueOf(this.registers.read(register));

    if (!this.rob.isLive(tag)) {
      throw new Error(`R${register} names producer ${tag}, which is no longer in flight`);
    }
    const ready = this.rob.readyValue(tag);
    return ready === null ? tagOf(tag) : valueOf(ready);
  }

  private operand(source: SourceOperand): Operand {
    switch (source.kind) {
      case "register":
        return this.lookup(source.register);
      case "immediate":
        return valueOf(source.value);
      default:
        throw new OperandError(`Unexpected ${source.kind} operand`);
    }
  }

  private address(source: SourceOperand): AddressOperand {
    if (source.kind !== "memory") {
      throw new OperandError(`Expected a memory operand, got ${source.kind}`);
    }
    const base = this.lookup(source.base);
    return base.kind === "value"
      ? { kind: "resolved", address: base.value + source.offset }
      : { kind: "pending", tag: base.tag, offset: source.offset };
  }

  private validate(instruction: Instruction): void {
    const fail = (message: string): never => {
      throw new OperandError(`${instruction.opcode}: ${message}`, instruction.index);
    };
    const layout = LAYOUTS[instruction.opcode];

    if (layout.destination) {
      if (instruction.destination === null) fail("missing destination register");
      else this.checkRegister(instruction.destination, fail);
      if (instruction.opcode === Opcode.CALL && instruction.destination !== LINK_REGISTER) {
        fail(`CALL must link through R${LINK_REGISTER}`);
      }
    } else if (instruction.destination !== null) {
      fail("takes no destination register");
    }

    if (instruction.sources.length !== layout.sources.length) {
      fail(`expected ${layout.sources.length} source operands, got ${instruction.sources.length}`);
    }

    instruction.sources.forEach((source, position) => {
      if (source.kind !== layout.sources[position]) {
        fail(`operand ${position + 1} should be ${layout.sources[position]}, got ${source.kind}`);
      }
      switch (source.kind) {
        case "register":
          this.checkRegister(source.register, fail);
          break;
        case "immediate":
          this.checkWord(source.value, "immediate", fail);
          break;
        case "memory":
          this.checkRegister(source.base, fail);
          this.checkWord(source.offset, "displacement", fail);
          break;
        case "target":
          if (!Number.isInteger(source.index) || source.index < 0) fail(`invalid branch target ${source.index}`);
          break;
      }
    });
  }

  private checkRegister(index: number, fail: (message: string) => never): void {
    if (!this.registers.isValid(index)) {
      fail(`register R${index} out of range (R0-R${this.registers.count - 1})`);
    }
  }

  private checkWord(value: number, what: string, fail: (message: string) => never): void {
    if (!Number.isInteger(value) || value < WORD_MIN || value > WORD_MAX) {
      fail(`${what} ${value} is not a 16-bit integer`);
    }
  }
}

import { ProgramParseError } from "../exceptions/SimulationExceptions";
import {
  createInstruction,
  immediate,
  memoryRef,
  register,
  target,
  type Instruction,
  type SourceOperand,
} from "../isa/Instruction";
import { LINK_REGISTER, Opcode, lookupOpcode } from "../isa/Opcodes";
import { ProgramLexer, type Token } from "./ProgramLexer";

export interface ParsedProgram {
  instructions: Instruction[];
  labels: Record<string, number>;
}

interface PendingInstruction {
  index: number;
  line: number;
  opcode: Opcode;
  operands: Token[];
  text: string;
}

/**
 * Reads assembly text, one instruction per line:
 *
 *     loop:  LOAD  R2, 0(R1)     # comment
 *            ADDI  R1, R1, 1
 *            BEQ   R2, R0, loop
 *
 * Branch and call targets are either labels or signed offsets relative to the
 * following instruction (`BEQ R1, R2, -3`).
 */
export class ProgramParser {
  private readonly lexer = new ProgramLexer();

  parse(source: string): ParsedProgram {
    const labels = new Map<string, number>();
    const pending: PendingInstruction[] = [];

    for (const { line, text, tokens } of this.lexer.tokenize(source)) {
      let position = 0;
      while (tokens[position]?.type === "identifier" && tokens[position + 1]?.type === "colon") {
        const label = tokens[position];
        if (label.type !== "identifier") break;
        if (labels.has(label.name)) {
          throw new ProgramParseError(line, `Duplicate label '${label.name}'`);
        }
        labels.set(label.name, pending.length);
        position += 2;
      }

      const mnemonic = tokens[position];
      if (!mnemonic) continue;
      if (mnemonic.type !== "identifier") {
        throw new ProgramParseError(line, "Expected an instruction mnemonic");
      }
      const opcode = lookupOpcode(mnemonic.name);
      if (opcode === null) {
        throw new ProgramParseError(line, `Unknown mnemonic '${mnemonic.name}'`);
      }

      pending.push({
        index: pending.length,
        line,
        opcode,
        operands: tokens.slice(position + 1),
        text: text.slice(mnemonic.column - 1).trim().replace(/\s+/g, " "),
      });
    }

    const instructions = pending.map((entry) => this.build(entry, labels));
    return { instructions, labels: Object.fromEntries(labels) };
  }

  private build(entry: PendingInstruction, labels: ReadonlyMap<string, number>): Instruction {
    const cursor = new OperandCursor(entry.operands, entry.line);
    let destination: number | null = null;
    let sources: SourceOperand[] = [];

    switch (entry.opcode) {
      case Opcode.ADD:
      case Opcode.NAND:
      case Opcode.MUL: {
        destination = cursor.register();
        cursor.comma();
        const left = cursor.register();
        cursor.comma();
        sources = [register(left), register(cursor.register())];
        break;
      }
      case Opcode.ADDI: {
        destination = cursor.register();
        cursor.comma();
        const base = cursor.register();
        cursor.comma();
        sources = [register(base), immediate(cursor.number())];
        break;
      }
      case Opcode.LOAD:
        destination = cursor.register();
        cursor.comma();
        sources = [cursor.memory()];
        break;
      case Opcode.STORE: {
        const data = cursor.register();
        cursor.comma();
        sources = [register(data), cursor.memory()];
        break;
      }
      case Opcode.BEQ: {
        const left = cursor.register();
        cursor.comma();
        const right = cursor.register();
        cursor.comma();
        sources = [register(left), register(right), target(cursor.target(entry.index, labels))];
        break;
      }
      case Opcode.CALL:
        destination = LINK_REGISTER;
        sources = [target(cursor.target(entry.index, labels))];
        break;
      case Opcode.RET:
        sources = [register(LINK_REGISTER)];
        break;
    }

    cursor.end();
    return createInstruction(entry.index, entry.opcode, destination, sources, entry.text);
  }
}

class OperandCursor {
  private position = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly line: number,
  ) {}

  register(): number {
    const token = this.next("a register");
    if (token.type !== "register") this.fail("Expected a register");
    return token.index;
  }

  number(): number {
    const token = this.next("a number");
    if (token.type !== "number") this.fail("Expected a number");
    return token.value;
  }

  /** `offset(Rn)`, with the offset optional. */
  memory(): SourceOperand {
    let offset = 0;
    const first = this.peek();
    if (first?.type === "number") {
      offset = first.value;
      this.position++;
    }
    this.expect("lparen", "'('");
    const base = this.register();
    this.expect("rparen", "')'");
    return memoryRef(offset, base);
  }

  target(index: number, labels: ReadonlyMap<string, number>): number {
    const token = this.next("a branch target");
    let resolved: number;
    if (token.type === "identifier") {
      const labelIndex = labels.get(token.name);
      if (labelIndex === undefined) this.fail(`Undefined label '${token.name}'`);
      resolved = labelIndex;
    } else if (token.type === "number") {
      resolved = index + 1 + token.value;
    } else {
      this.fail("Expected a label or a relative offset");
    }
    if (resolved < 0) this.fail(`Branch target ${resolved} is before the first instruction`);
    return resolved;
  }

  /** Operands may be separated by a comma or by whitespace alone. */
  comma(): void {
    if (this.peek()?.type === "comma") this.position++;
  }

  end(): void {
    if (this.position < this.tokens.length) this.fail("Unexpected trailing operands");
  }

  private expect(type: Token["type"], description: string): void {
    const token = this.next(description);
    if (token.type !== type) this.fail(`Expected ${description}`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(description: string): Token {
    const token = this.tokens[this.position];
    if (!token) this.fail(`Missing ${description}`);
    this.position++;
    return token;
  }

  private fail(message: string): never {
    throw new ProgramParseError(this.line, message);
  }
}

export function parseProgram(source: string): Instruction[] {
  return new ProgramParser().parse(source).instructions;
}

import { ProgramParseError } from "../exceptions/SimulationExceptions";

interface Position {
  line: number;
  column: number;
}

export type Token =
  | ({ type: "identifier"; name: string } & Position)
  | ({ type: "register"; index: number } & Position)
  | ({ type: "number"; value: number } & Position)
  | ({ type: "comma" | "colon" | "lparen" | "rparen" } & Position);

export interface LexedLine {
  line: number;
  /** Source with the comment removed. */
  text: string;
  tokens: Token[];
}

const PUNCTUATION: Readonly<Record<string, "comma" | "colon" | "lparen" | "rparen">> = {
  ",": "comma",
  ":": "colon",
  "(": "lparen",
  ")": "rparen",
};

export class ProgramLexer {
  tokenize(source: string): LexedLine[] {
    return source.split(/\r?\n/).map((raw, index) => {
      const line = index + 1;
      const text = stripComment(raw);
      return { line, text, tokens: this.tokenizeLine(text, line) };
    });
  }

  private tokenizeLine(text: string, line: number): Token[] {
    const tokens: Token[] = [];

    let i = 0;
    while (i < text.length) {
      const char = text[i];
      if (/\s/.test(char)) {
        i++;
        continue;
      }

      const column = i + 1;
      const punctuation = PUNCTUATION[char];
      if (punctuation) {
        tokens.push({ type: punctuation, line, column });
        i++;
        continue;
      }

      if (/[0-9+-]/.test(char)) {
        const length = readWhile(text, i + 1, /[0-9A-Fa-fxX]/) + 1;
        tokens.push({ type: "number", value: parseNumber(text.slice(i, i + length), line), line, column });
        i += length;
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        const length = readWhile(text, i, /[A-Za-z0-9_.]/);
        const word = text.slice(i, i + length);
        const register = /^[Rr](\d+)$/.exec(word);
        tokens.push(
          register
            ? { type: "register", index: Number(register[1]), line, column }
            : { type: "identifier", name: word, line, column },
        );
        i += length;
        continue;
      }

      throw new ProgramParseError(line, `Unexpected character '${char}' at column ${column}`);
    }

    return tokens;
  }
}

function stripComment(text: string): string {
  const match = /#|;|\/\//.exec(text);
  return match ? text.slice(0, match.index) : text;
}

function readWhile(text: string, start: number, pattern: RegExp): number {
  let i = start;
  while (i < text.length && pattern.test(text[i])) i++;
  return i - start;
}

function parseNumber(raw: string, line: number): number {
  const match = /^([+-]?)(0[xX][0-9A-Fa-f]+|\d+)$/.exec(raw);
  if (!match) {
    throw new ProgramParseError(line, `Invalid number '${raw}'`);
  }
  const magnitude = Number(match[2]);
  return match[1] === "-" ? -magnitude : magnitude;
}

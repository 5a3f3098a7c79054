import { toWord } from "../isa/Word";
import type { ProducerTag } from "../scheduler/SchedulerTypes";

export const DEFAULT_REGISTER_COUNT = 8;

export interface RegisterFileSnapshot {
  values: number[];
  tags: Array<ProducerTag | null>;
}

/**
 * Architectural register values plus the register status table. A register's
 * tag names the in-flight instruction that will produce its next value; issuing
 * a newer writer simply retags it, which is all renaming needs.
 */
export class RegisterFile {
  static readonly ZERO_REGISTER = 0;

  private readonly values: Int16Array;
  private readonly tags: Array<ProducerTag | null>;

  constructor(readonly count: number = DEFAULT_REGISTER_COUNT, initial: Record<number, number> = {}) {
    this.values = new Int16Array(count);
    this.tags = Array.from({ length: count }, () => null);
    for (const [index, value] of Object.entries(initial)) {
      this.write(Number(index), value);
    }
  }

  isValid(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.count;
  }

  read(index: number): number {
    return this.values[index];
  }

  write(index: number, value: number): void {
    if (index === RegisterFile.ZERO_REGISTER) return; // R0 is hard-wired
    this.values[index] = toWord(value);
  }

  tag(index: number): ProducerTag | null {
    return this.tags[index];
  }

  setTag(index: number, tag: ProducerTag): void {
    if (index === RegisterFile.ZERO_REGISTER) return;
    this.tags[index] = tag;
  }

  clearTag(index: number): void {
    this.tags[index] = null;
  }

  /** Clears the tag only when it still names `tag`; a newer producer keeps its claim. */
  retireTag(index: number, tag: ProducerTag): boolean {
    if (this.tags[index] !== tag) return false;
    this.tags[index] = null;
    return true;
  }

  /** Registers whose tag satisfies `predicate`. */
  taggedWhere(predicate: (tag: ProducerTag) => boolean): number[] {
    const matches: number[] = [];
    this.tags.forEach((tag, index) => {
      if (tag !== null && predicate(tag)) matches.push(index);
    });
    return matches;
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  snapshot(): RegisterFileSnapshot {
    return { values: this.toArray(), tags: [...this.tags] };
  }
}

import { MemoryBoundsError } from "../exceptions/SimulationExceptions";
import { toWord } from "../isa/Word";

export const DEFAULT_MEMORY_SIZE = 65536;

/** Flat word-addressed data memory. Every access outside `[0, size)` fails. */
export class DataMemory {
  private readonly words: Int16Array;
  private readonly writtenAddresses = new Set<number>();

  constructor(readonly size: number = DEFAULT_MEMORY_SIZE, initial: Record<number, number> = {}) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Invalid memory size: ${size}`);
    }
    this.words = new Int16Array(size);
    for (const [address, value] of Object.entries(initial)) {
      this.store(Number(address), value);
    }
  }

  load(address: number): number {
    return this.words[this.validateAddress(address)];
  }

  store(address: number, value: number): void {
    const normalized = this.validateAddress(address);
    this.words[normalized] = toWord(value);
    this.writtenAddresses.add(normalized);
  }

  contains(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address < this.size;
  }

  reset(): void {
    this.words.fill(0);
    this.writtenAddresses.clear();
  }

  /**
   * Returns every address that has been stored to, sorted, with its current value.
   */
  entries(): Array<{ address: number; value: number }> {
    return [...this.writtenAddresses]
      .sort((a, b) => a - b)
      .map((address) => ({ address, value: this.words[address] }));
  }

  private validateAddress(address: number): number {
    if (!this.contains(address)) {
      throw new MemoryBoundsError(address, this.size);
    }
    return address;
  }
}

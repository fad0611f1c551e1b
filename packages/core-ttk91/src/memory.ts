import { EmulatorError, formatAddress } from './errors';
import type { Memory } from './types';

export const MEMORY_LIMIT = 0x10000;

// ロード済みイメージから始まり、書き込みに応じて伸びるメモリ。
export class GrowableMemory implements Memory {
  private readonly words: number[];

  private readonly limit: number;

  constructor(image: ArrayLike<number>, limit = MEMORY_LIMIT) {
    if (image.length > limit) {
      throw new EmulatorError('MEMORY_ACCESS', `Image of ${image.length} words exceeds memory limit ${limit}`);
    }
    this.words = Array.from(image, (word) => word | 0);
    this.limit = limit;
  }

  get size(): number {
    return this.words.length;
  }

  getData(address: number): number {
    const value = Number.isInteger(address) && address >= 0 ? this.words[address] : undefined;
    if (value === undefined) {
      throw new EmulatorError('MEMORY_ACCESS', `Read outside allocated memory at ${formatAddress(address)}`, {
        address
      });
    }
    return value;
  }

  setData(address: number, data: number): void {
    if (!Number.isInteger(address) || address < 0 || address >= this.limit) {
      throw new EmulatorError('MEMORY_ACCESS', `Write outside memory limit at ${formatAddress(address)}`, {
        address
      });
    }
    while (this.words.length < address) {
      this.words.push(0);
    }
    this.words[address] = data | 0;
  }
}

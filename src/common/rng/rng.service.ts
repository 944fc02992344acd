// Seeded splitmix64 generator; the same seed replays the same rolls

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

export interface WeightedOption<T> {
  value: T;
  weight: number;
}

export class Rng {
  private state: bigint;

  constructor(readonly seed: string) {
    this.state = this.hashSeed(seed);
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private nextRaw(): bigint {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) */
  next(): number {
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  /** Picks one option with probability proportional to its weight. */
  pickWeighted<T>(options: readonly WeightedOption<T>[]): T {
    const total = options.reduce((sum, o) => sum + Math.max(0, o.weight), 0);
    if (options.length === 0 || total <= 0) {
      throw new Error('pickWeighted needs at least one positive weight');
    }
    let roll = this.next() * total;
    for (const option of options) {
      roll -= Math.max(0, option.weight);
      if (roll < 0) return option.value;
    }
    return options[options.length - 1].value;
  }
}

@Injectable()
export class RngService {
  /** Fresh seed per call unless one is given */
  create(seed: string = randomUUID()): Rng {
    return new Rng(seed);
  }
}

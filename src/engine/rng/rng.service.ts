// splitmix64 deterministic RNG; every battle draw comes from a per-turn stream

import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';

/** The slice of Rng the combat math draws from. */
export interface RandomSource {
  /** 0.0 ~ 1.0 */
  next(): number;
  uniform(min: number, max: number): number;
  /** min~max integer (inclusive) */
  range(min: number, max: number): number;
  pick<T>(items: readonly T[]): T | undefined;
}

/** Stream offsets added to seed + turn, one per kind of draw. */
export const STREAM_OFFSET = {
  ATTACK: 0,
  SKILL: 101,
  ULTIMATE: 303,
  FLEE: 404,
  MONSTER: 999,
  NARRATION: 1999,
  LOOT: 4242,
} as const;
export type StreamName = keyof typeof STREAM_OFFSET;

export class Rng implements RandomSource {
  private state: bigint;

  constructor(seed: string) {
    this.state = this.hashSeed(seed);
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & 0xFFFFFFFFFFFFFFFFn;
    }
    return h === 0n ? 1n : h;
  }

  private nextRaw(): bigint {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & 0xFFFFFFFFFFFFFFFFn;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & 0xFFFFFFFFFFFFFFFFn;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & 0xFFFFFFFFFFFFFFFFn;
    return (z ^ (z >> 31n)) & 0xFFFFFFFFFFFFFFFFn;
  }

  next(): number {
    return Number(this.nextRaw()) / Number(0xFFFFFFFFFFFFFFFFn);
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  range(min: number, max: number): number {
    return Math.min(max, Math.floor(this.next() * (max - min + 1)) + min);
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.range(0, items.length - 1)];
  }
}

@Injectable()
export class RngService {
  /** Same (seed, turn, stream) always replays the same draws. */
  forTurn(seed: number, turn: number, stream: StreamName): RandomSource {
    return new Rng(String(seed + turn + STREAM_OFFSET[stream]));
  }

  /** 32-bit battle seed derived from the battle's identity. */
  seedFor(...parts: string[]): number {
    return createHash('sha256').update(parts.join(':')).digest().readUInt32BE(0);
  }
}

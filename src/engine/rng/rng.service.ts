// splitmix64 기반 결정적 RNG + 프로세스 기본 균등 분포 소스

import { Injectable } from '@nestjs/common';

/** 라우터가 사용하는 균등 분포 난수원 — 테스트에서 결정적 소스로 교체 */
export interface RandomSource {
  /** [min, max) 범위 실수 */
  uniform(min: number, max: number): number;
}

export class MathRandomSource implements RandomSource {
  uniform(min: number, max: number): number {
    return min + Math.random() * (max - min);
  }
}

/** 64비트 원시값 → [0, 1) — 상위 53비트만 사용해 1.0이 나오지 않는다 */
export function toUnitInterval(raw: bigint): number {
  return Number(raw >> 11n) / 2 ** 53;
}

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

  /** splitmix64 원시 호출 — 0~2^64 범위 */
  private nextRaw(): bigint {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & 0xFFFFFFFFFFFFFFFFn;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & 0xFFFFFFFFFFFFFFFFn;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & 0xFFFFFFFFFFFFFFFFn;
    return (z ^ (z >> 31n)) & 0xFFFFFFFFFFFFFFFFn;
  }

  /** [0, 1) 실수 */
  next(): number {
    return toUnitInterval(this.nextRaw());
  }

  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }
}

@Injectable()
export class RngService {
  /** seed가 있으면 결정적 Rng, 없으면 Math.random */
  createSource(seed: string | null): RandomSource {
    return seed ? new Rng(seed) : new MathRandomSource();
  }
}

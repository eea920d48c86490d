import {
  MathRandomSource,
  Rng,
  RngService,
  toUnitInterval,
} from './rng.service.js';

describe('RngService', () => {
  let service: RngService;

  beforeEach(() => {
    service = new RngService();
  });

  it('seed가 있으면 Rng 인스턴스', () => {
    expect(service.createSource('test-seed')).toBeInstanceOf(Rng);
  });

  it('seed가 없으면 MathRandomSource', () => {
    expect(service.createSource(null)).toBeInstanceOf(MathRandomSource);
  });

  it('빈 문자열 seed는 미설정으로 취급', () => {
    expect(service.createSource('')).toBeInstanceOf(MathRandomSource);
  });
});

describe('Rng — 결정성', () => {
  it('동일 seed → 동일 시퀀스', () => {
    const a = new Rng('seed-abc');
    const b = new Rng('seed-abc');

    for (let i = 0; i < 100; i++) {
      expect(a.uniform(0, 100)).toBe(b.uniform(0, 100));
    }
  });

  it('다른 seed → 다른 시퀀스', () => {
    const a = new Rng('seed-1');
    const b = new Rng('seed-2');

    const results = Array.from({ length: 10 }, () => a.next() === b.next());
    expect(results.some((same) => !same)).toBe(true);
  });
});

describe('toUnitInterval', () => {
  it('0 → 0', () => {
    expect(toUnitInterval(0n)).toBe(0);
  });

  it('2^64-1 → 1 미만', () => {
    expect(toUnitInterval(0xFFFFFFFFFFFFFFFFn)).toBeLessThan(1);
    expect(toUnitInterval(0xFFFFFFFFFFFFFFFFn)).toBe(1 - 2 ** -53);
  });

  it('2^63 → 0.5', () => {
    expect(toUnitInterval(1n << 63n)).toBe(0.5);
  });
});

describe('Rng — uniform', () => {
  it('[0, 100) 범위 안에 있다', () => {
    const rng = new Rng('uniform-range');
    for (let i = 0; i < 1000; i++) {
      const val = rng.uniform(0, 100);
      expect(val).toBeGreaterThanOrEqual(0);
      expect(val).toBeLessThan(100);
    }
  });

  it('min/max 오프셋 적용', () => {
    const a = new Rng('offset');
    const b = new Rng('offset');
    expect(a.uniform(10, 20)).toBeCloseTo(10 + b.next() * 10, 10);
  });
});

describe('MathRandomSource', () => {
  it('범위 안의 값을 반환한다', () => {
    const source = new MathRandomSource();
    for (let i = 0; i < 200; i++) {
      const val = source.uniform(5, 15);
      expect(val).toBeGreaterThanOrEqual(5);
      expect(val).toBeLessThan(15);
    }
  });
});

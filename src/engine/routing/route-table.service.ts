// 라우트 비중 검증 + 100% 정규화

import { Injectable, Logger } from '@nestjs/common';
import type {
  RawWeight,
  RouteConfig,
  RouteTable,
  RouteTableEntry,
} from './routing.types.js';

export const MAX_WEIGHT = 100;

// 10진수/지수 표기만 — 0x, 0b, 0o 접두어는 비중으로 보지 않는다
const DECIMAL_WEIGHT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * 비중을 유한한 숫자로 변환. 변환 불가면 null.
 * 값이 아예 없으면 0으로 본다 (비중 미입력 행).
 */
export function coerceWeight(raw: RawWeight): number | null {
  if (raw === undefined) return 0;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!DECIMAL_WEIGHT.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

@Injectable()
export class RouteTableService {
  private readonly logger = new Logger(RouteTableService.name);

  /**
   * 1. 변환 불가 비중 제거, [0, 100] 클램프
   * 2. 유효 항목 없음 → 빈 테이블
   * 3. 합계 0 → 균등 분배 (선호 없음으로 해석)
   * 4. 합계 != 100 → weight / total * 100
   * 입력 순서 유지 — Sampler의 동률 처리가 순서에 의존
   */
  build(routes: readonly RouteConfig[], hasElse: boolean): RouteTable {
    const valid: RouteTableEntry[] = [];

    routes.forEach((route, routeIndex) => {
      const weight = coerceWeight(route.weight);
      if (weight === null) {
        this.logger.debug(
          `Dropping route ${routeIndex} (${route.name}): unusable weight ${String(route.weight)}`,
        );
        return;
      }
      valid.push({
        routeIndex,
        weight: Math.min(MAX_WEIGHT, Math.max(0, weight)),
      });
    });

    if (valid.length === 0) {
      return Object.freeze({ entries: Object.freeze([]), hasElse });
    }

    const total = valid.reduce((sum, e) => sum + e.weight, 0);
    let entries = valid;
    if (total === 0) {
      const equal = MAX_WEIGHT / valid.length;
      entries = valid.map((e) => ({ routeIndex: e.routeIndex, weight: equal }));
    } else if (total !== MAX_WEIGHT) {
      entries = valid.map((e) => ({
        routeIndex: e.routeIndex,
        weight: (e.weight / total) * MAX_WEIGHT,
      }));
    }

    return Object.freeze({
      entries: Object.freeze(entries.map((e) => Object.freeze(e))),
      hasElse,
    });
  }
}

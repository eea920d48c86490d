import { Injectable } from '@nestjs/common';
import type { RandomSource } from '../rng/rng.service.js';
import { MAX_WEIGHT } from './route-table.service.js';
import type { RouteTable, SelectionResult } from './routing.types.js';

@Injectable()
export class SamplerService {
  /**
   * 누적 구간 선택: r = uniform(0, 100), 순서대로 누적하여 r <= cumulative 인
   * 첫 항목 선택. 부동소수 오차로 아무것도 안 걸리면 마지막 항목.
   */
  select(table: RouteTable, rng: RandomSource): SelectionResult {
    const { entries } = table;
    if (entries.length === 0) {
      return { selectedRouteIndex: null, drawValue: 0 };
    }

    const drawValue = rng.uniform(0, MAX_WEIGHT);
    let cumulative = 0;
    for (const entry of entries) {
      cumulative += entry.weight;
      if (drawValue <= cumulative) {
        return { selectedRouteIndex: entry.routeIndex, drawValue };
      }
    }

    return {
      selectedRouteIndex: entries[entries.length - 1].routeIndex,
      drawValue,
    };
  }
}

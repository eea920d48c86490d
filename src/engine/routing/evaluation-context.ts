// 노드 1회 실행 단위 — "한 번 계산, 여러 번 읽기"

import type { RandomSource } from '../rng/rng.service.js';
import type {
  RouteConfig,
  RouterConfigInput,
  RouteTable,
  SelectionResult,
} from './routing.types.js';

export interface ResolvedDispatch {
  table: RouteTable;
  selection: SelectionResult;
  status: string;
}

export interface EvaluationContextOptions {
  /** 이 평가에서만 쓸 난수원 — 없으면 엔진의 프로세스 기본 소스 */
  random?: RandomSource;
}

/**
 * 호스트 엔진이 노드 실행마다 새로 만든다. 평가 간 공유 금지.
 * 라우트 설정은 생성 시점 스냅샷으로 고정된다.
 */
export class EvaluationContext {
  readonly routes: readonly Readonly<RouteConfig>[];
  readonly enableElse: boolean;
  readonly random?: RandomSource;
  private resolved: ResolvedDispatch | null = null;

  constructor(config: RouterConfigInput, options: EvaluationContextOptions = {}) {
    this.routes = Object.freeze(config.routes.map((r) => Object.freeze({ ...r })));
    this.enableElse = config.enableElse ?? false;
    this.random = options.random;
  }

  get isResolved(): boolean {
    return this.resolved !== null;
  }

  /** 최초 호출만 compute 실행, 이후는 캐시 반환 */
  resolve(compute: (ctx: EvaluationContext) => ResolvedDispatch): ResolvedDispatch {
    if (this.resolved === null) {
      this.resolved = compute(this);
    }
    return this.resolved;
  }

  /** 아직 선택 전이면 빈 문자열 */
  get status(): string {
    return this.resolved?.status ?? '';
  }
}

import { EvaluationContext, type ResolvedDispatch } from './evaluation-context.js';
import { Rng } from '../rng/rng.service.js';
import type { RouteConfig } from './routing.types.js';

function resolved(status: string): ResolvedDispatch {
  return {
    table: { entries: [], hasElse: false },
    selection: { selectedRouteIndex: null, drawValue: 0 },
    status,
  };
}

describe('EvaluationContext', () => {
  it('enableElse 기본값 false', () => {
    const ctx = new EvaluationContext({ routes: [] });
    expect(ctx.enableElse).toBe(false);
    expect(ctx.random).toBeUndefined();
  });

  it('resolve는 최초 1회만 compute 실행', () => {
    const ctx = new EvaluationContext({ routes: [{ name: 'A', weight: 100 }] });
    const compute = jest.fn(() => resolved('first'));

    expect(ctx.isResolved).toBe(false);
    expect(ctx.status).toBe('');
    const a = ctx.resolve(compute);
    const b = ctx.resolve(() => resolved('second'));

    expect(compute).toHaveBeenCalledTimes(1);
    expect(compute).toHaveBeenCalledWith(ctx);
    expect(b).toBe(a);
    expect(ctx.isResolved).toBe(true);
    expect(ctx.status).toBe('first');
  });

  it('컨텍스트끼리 캐시를 공유하지 않는다', () => {
    const config = { routes: [{ name: 'A', weight: 100 }] };
    const first = new EvaluationContext(config);
    const second = new EvaluationContext(config);

    first.resolve(() => resolved('one'));
    expect(second.isResolved).toBe(false);
  });

  it('라우트 설정은 생성 시점 스냅샷', () => {
    const routes: RouteConfig[] = [{ name: 'A', weight: 10 }];
    const ctx = new EvaluationContext({ routes });

    routes[0].weight = 90;
    routes.push({ name: 'B', weight: 5 });

    expect(ctx.routes).toEqual([{ name: 'A', weight: 10 }]);
    expect(Object.isFrozen(ctx.routes)).toBe(true);
    expect(Object.isFrozen(ctx.routes[0])).toBe(true);
  });

  it('평가별 난수원 보관', () => {
    const random = new Rng('ctx');
    const ctx = new EvaluationContext({ routes: [], enableElse: true }, { random });
    expect(ctx.random).toBe(random);
    expect(ctx.enableElse).toBe(true);
  });
});

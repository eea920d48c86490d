import { Logger } from '@nestjs/common';
import { RouterController } from './router.controller.js';
import { RouterService } from './router.service.js';
import { DispatchEngineService } from '../engine/routing/dispatch-engine.service.js';
import { RouteTableService } from '../engine/routing/route-table.service.js';
import { SamplerService } from '../engine/routing/sampler.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { RouterConfigService } from '../config/router-config.service.js';

describe('RouterController', () => {
  let controller: RouterController;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const engine = new DispatchEngineService(
      new RouteTableService(),
      new SamplerService(),
      new RouterConfigService({}),
      new RngService(),
    );
    controller = new RouterController(new RouterService(engine));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('outputs — 슬롯 목록', () => {
    expect(
      controller.outputs({
        routes: [
          { name: 'Route A', weight: 50 },
          { name: 'Route B', weight: 50 },
        ],
        enableElse: false,
      }),
    ).toEqual([
      { id: 'route_1_result', displayName: 'Route A (50%)', kind: 'route', routeIndex: 0 },
      { id: 'route_2_result', displayName: 'Route B (50%)', kind: 'route', routeIndex: 1 },
    ]);
  });

  it('dispatch — 정확히 하나의 라우트만 활성', () => {
    const res = controller.dispatch({
      routes: [
        { name: 'Route A', weight: 50 },
        { name: 'Route B', weight: 50 },
      ],
      enableElse: true,
      input: 'hello',
    });

    const active = res.outputs.filter((o) => o.active);
    expect(active).toHaveLength(1);
    expect(active[0].payload).toBe('hello');
    expect(res.outputs.find((o) => o.id === 'default_result')?.active).toBe(false);
    expect(res.status).toBe(`Selected: ${active[0].displayName.replace(' (50%)', '')}`);
  });
});

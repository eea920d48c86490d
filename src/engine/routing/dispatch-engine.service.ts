// 랜덤 라우터 디스패치 — 평가당 1회 선택, 선택된 출력 외 전부 차단

import { Injectable, Logger } from '@nestjs/common';
import { RouterConfigService } from '../../config/router-config.service.js';
import { RngService, type RandomSource } from '../rng/rng.service.js';
import { RouteTableService } from './route-table.service.js';
import { SamplerService } from './sampler.service.js';
import { EvaluationContext, type ResolvedDispatch } from './evaluation-context.js';
import { describeOutputs, routeLabel } from './route-outputs.js';
import type {
  DispatchReport,
  OutputVerdict,
  RouterConfigInput,
} from './routing.types.js';

export const STATUS_NO_ROUTES = 'No routes configured';
export const STATUS_NO_SELECTION = 'No route selected and Else output is disabled';
export const STATUS_ELSE_FALLBACK =
  'No route selected - using input data as fallback for Else output';

const SUPPRESSED = { active: false, payload: null } as const;

@Injectable()
export class DispatchEngineService {
  private readonly logger = new Logger(DispatchEngineService.name);
  private source: RandomSource | null = null;
  private sourceSeed: string | null = null;

  constructor(
    private readonly routeTable: RouteTableService,
    private readonly sampler: SamplerService,
    private readonly config: RouterConfigService,
    private readonly rng: RngService,
  ) {}

  createContext(
    config: RouterConfigInput,
    random?: RandomSource,
  ): EvaluationContext {
    return new EvaluationContext(config, { random });
  }

  /** 이름 → 첫 번째로 일치하는 라우트. 없는 이름은 차단 */
  getRouteOutput<T>(
    ctx: EvaluationContext,
    routeName: string,
    passthrough: T,
  ): OutputVerdict<T> {
    const routeIndex = ctx.routes.findIndex((r) => r.name === routeName);
    return this.getRouteOutputAt(ctx, routeIndex, passthrough);
  }

  getRouteOutputAt<T>(
    ctx: EvaluationContext,
    routeIndex: number,
    passthrough: T,
  ): OutputVerdict<T> {
    const { selection } = this.resolve(ctx);
    if (routeIndex < 0 || selection.selectedRouteIndex !== routeIndex) {
      return SUPPRESSED;
    }

    const override = ctx.routes[routeIndex].override;
    return {
      active: true,
      payload: this.isUsableOverride(override) ? override : passthrough,
    };
  }

  /** Else — 선택된 라우트가 없고 Else가 켜진 경우에만 활성 */
  getElseOutput<T>(ctx: EvaluationContext, passthrough: T): OutputVerdict<T> {
    const { table, selection } = this.resolve(ctx);
    if (ctx.routes.length === 0 || !table.hasElse) return SUPPRESSED;
    if (selection.selectedRouteIndex !== null) return SUPPRESSED;
    return { active: true, payload: passthrough };
  }

  /** 선언된 모든 출력 슬롯을 레이아웃 순서대로 읽는다 */
  dispatch<T>(ctx: EvaluationContext, passthrough: T): DispatchReport<T> {
    const outputs = describeOutputs(ctx).map((descriptor) => ({
      id: descriptor.id,
      displayName: descriptor.displayName,
      verdict:
        descriptor.kind === 'else' || descriptor.routeIndex === undefined
          ? this.getElseOutput(ctx, passthrough)
          : this.getRouteOutputAt(ctx, descriptor.routeIndex, passthrough),
    }));
    const { selection, status } = this.resolve(ctx);
    return { status, selection, outputs };
  }

  private resolve(ctx: EvaluationContext): ResolvedDispatch {
    return ctx.resolve((c) => this.select(c));
  }

  private select(ctx: EvaluationContext): ResolvedDispatch {
    const table = this.routeTable.build(ctx.routes, ctx.enableElse);

    if (ctx.routes.length === 0) {
      this.logger.debug(STATUS_NO_ROUTES);
      return {
        table,
        selection: { selectedRouteIndex: null, drawValue: 0 },
        status: STATUS_NO_ROUTES,
      };
    }

    if (table.entries.length === 0) {
      const status = table.hasElse ? STATUS_ELSE_FALLBACK : STATUS_NO_SELECTION;
      this.logger.debug(status);
      return {
        table,
        selection: { selectedRouteIndex: null, drawValue: 0 },
        status,
      };
    }

    const selection = this.sampler.select(table, ctx.random ?? this.processSource());
    if (selection.selectedRouteIndex === null) {
      return { table, selection, status: STATUS_NO_SELECTION };
    }

    const index = selection.selectedRouteIndex;
    const name = routeLabel(ctx.routes[index], index);
    this.logger.log(
      `Random selection: ${name} (route index: ${index}, random value: ${selection.drawValue.toFixed(2)})`,
    );
    return { table, selection, status: `Selected: ${name}` };
  }

  /** 프로세스 기본 소스 — seed 설정이 바뀌면 다음 평가에서 재생성 */
  private processSource(): RandomSource {
    const seed = this.config.get().rngSeed;
    if (this.source === null || seed !== this.sourceSeed) {
      this.source = this.rng.createSource(seed);
      this.sourceSeed = seed;
    }
    return this.source;
  }

  private isUsableOverride(override: string | null | undefined): override is string {
    if (typeof override !== 'string') return false;
    const trimmed = override.trim();
    if (trimmed.length === 0) return false;
    return !this.config.get().overrideSentinels.includes(trimmed.toLowerCase());
  }
}

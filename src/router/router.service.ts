import { Injectable } from '@nestjs/common';
import { DispatchEngineService } from '../engine/routing/dispatch-engine.service.js';
import { describeOutputs } from '../engine/routing/route-outputs.js';
import type { OutputDescriptor } from '../engine/routing/routing.types.js';
import type { DispatchBody, RouterLayoutBody } from './dto/dispatch.dto.js';

export interface DispatchOutputView {
  id: string;
  displayName: string;
  active: boolean;
  payload: unknown;
}

export interface DispatchResponse {
  status: string;
  selectedRouteIndex: number | null;
  drawValue: number;
  outputs: DispatchOutputView[];
}

@Injectable()
export class RouterService {
  constructor(private readonly engine: DispatchEngineService) {}

  layout(body: RouterLayoutBody): OutputDescriptor[] {
    return describeOutputs(body);
  }

  /** 요청마다 새 평가 컨텍스트 — 요청 간 선택 상태 공유 없음 */
  dispatch(body: DispatchBody): DispatchResponse {
    const ctx = this.engine.createContext({
      routes: body.routes,
      enableElse: body.enableElse,
    });
    const report = this.engine.dispatch(ctx, body.input ?? null);

    return {
      status: report.status,
      selectedRouteIndex: report.selection.selectedRouteIndex,
      drawValue: report.selection.drawValue,
      outputs: report.outputs.map((o) => ({
        id: o.id,
        displayName: o.displayName,
        active: o.verdict.active,
        payload: o.verdict.payload,
      })),
    };
  }
}

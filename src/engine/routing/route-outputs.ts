// 라우터 노드가 노출하는 출력 슬롯 목록 (라우트마다 1개 + 선택적 Else)

import type { OutputDescriptor, RouteConfig, RouterConfigInput } from './routing.types.js';

export const ELSE_OUTPUT_ID = 'default_result';
export const ELSE_OUTPUT_LABEL = 'Else';

export function routeOutputId(routeIndex: number): string {
  return `route_${routeIndex + 1}_result`;
}

export function routeLabel(route: RouteConfig, routeIndex: number): string {
  return route.name.trim().length > 0 ? route.name : `Route ${routeIndex + 1}`;
}

function formatWeight(route: RouteConfig): string {
  return route.weight === undefined || route.weight === null
    ? '0'
    : String(route.weight);
}

export function describeOutputs(config: RouterConfigInput): OutputDescriptor[] {
  const outputs: OutputDescriptor[] = config.routes.map((route, routeIndex) => ({
    id: routeOutputId(routeIndex),
    displayName: `${routeLabel(route, routeIndex)} (${formatWeight(route)}%)`,
    kind: 'route',
    routeIndex,
  }));

  if (config.enableElse) {
    outputs.push({ id: ELSE_OUTPUT_ID, displayName: ELSE_OUTPUT_LABEL, kind: 'else' });
  }
  return outputs;
}

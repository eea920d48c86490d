// 랜덤 라우터 공용 타입

/** 업스트림 설정이 넘기는 가공 전 비중 — 범위 밖/숫자 아님 가능 */
export type RawWeight = number | string | null | undefined;

export interface RouteConfig {
  name: string;
  weight?: RawWeight;
  override?: string | null;
}

export interface RouterConfigInput {
  routes: readonly RouteConfig[];
  enableElse?: boolean;
}

export interface RouteTableEntry {
  routeIndex: number;
  weight: number;
}

export interface RouteTable {
  entries: readonly RouteTableEntry[];
  hasElse: boolean;
}

export interface SelectionResult {
  /** 유효한 라우트가 하나도 없을 때만 null */
  selectedRouteIndex: number | null;
  drawValue: number;
}

/** active=false 는 호스트 엔진에 대한 "이 엣지 하위는 실행하지 말 것" 신호 */
export type OutputVerdict<T> =
  | { active: true; payload: T | string }
  | { active: false; payload: null };

export const OUTPUT_KIND = ['route', 'else'] as const;
export type OutputKind = (typeof OUTPUT_KIND)[number];

export interface OutputDescriptor {
  id: string;
  displayName: string;
  kind: OutputKind;
  routeIndex?: number;
}

export interface OutputReport<T> {
  id: string;
  displayName: string;
  verdict: OutputVerdict<T>;
}

export interface DispatchReport<T> {
  status: string;
  selection: SelectionResult;
  outputs: OutputReport<T>[];
}

// 라우터 설정 서비스 — .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';

export interface RouterConfig {
  port: number;
  /** 설정 시 프로세스 기본 난수원을 결정적 Rng로 */
  rngSeed: string | null;
  /** override 값이 이 중 하나면 "미설정"으로 간주 (대소문자 무시) */
  overrideSentinels: string[];
}

/** PATCH /v1/settings/router 에서 변경 가능한 필드 */
export type RouterConfigPatch = Partial<
  Pick<RouterConfig, 'rngSeed' | 'overrideSentinels'>
>;

/** GET 응답 — seed 값 자체는 노출하지 않음 */
export interface RouterConfigPublic {
  rngSeedSet: boolean;
  overrideSentinels: string[];
}

export function parseSentinels(raw: string | undefined): string[] {
  const list = (raw ?? 'none')
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
  return list.length > 0 ? list : ['none'];
}

@Injectable()
export class RouterConfigService {
  private readonly logger = new Logger(RouterConfigService.name);
  private config: RouterConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = {
      port: parseInt(env.PORT ?? '3000', 10),
      rngSeed: env.ROUTER_RNG_SEED ? env.ROUTER_RNG_SEED : null,
      overrideSentinels: parseSentinels(env.ROUTER_OVERRIDE_SENTINELS),
    };
  }

  get(): RouterConfig {
    return this.config;
  }

  /** 런타임 설정 변경 — 다음 평가부터 반영 */
  update(patch: RouterConfigPatch): RouterConfig {
    const next: RouterConfig = { ...this.config };
    if (patch.rngSeed !== undefined) next.rngSeed = patch.rngSeed;
    if (patch.overrideSentinels !== undefined) {
      next.overrideSentinels = patch.overrideSentinels.map((s) =>
        s.trim().toLowerCase(),
      );
    }
    this.config = next;
    this.logger.log(
      `Router config updated: ${JSON.stringify({
        rngSeedSet: patch.rngSeed === undefined ? undefined : patch.rngSeed !== null,
        overrideSentinels: patch.overrideSentinels,
      })}`,
    );
    return this.config;
  }

  getPublic(): RouterConfigPublic {
    return {
      rngSeedSet: this.config.rngSeed !== null,
      overrideSentinels: [...this.config.overrideSentinels],
    };
  }
}

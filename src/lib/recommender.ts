import {
  GeneratorConfig,
  HistoricalDraw,
  RejectionOutcome,
  StatisticsProfile,
} from "../types/lotto";
import { HistoryStore } from "./historyStore";
import { buildStatisticsProfile } from "./statisticsProfile";
import { generateSets } from "./rejectionEngine";
import { createRandomSource } from "./candidateSampler";
import { resolveGeneratorConfig, validateGeneratorConfig } from "./generatorConfig";
import { HistorySnapshot } from "./historyCache";

// timeoutMs 가 없을 때 요청 전체에 걸리는 기본 제한
export const DEFAULT_RECOMMEND_TIMEOUT_MS = 5_000;

export interface RecommendOptions {
  /** 요청에 포함된 history. 없으면 snapshot 의 history 사용 */
  history?: ReadonlyArray<readonly number[] | HistoricalDraw>;
  config?: Partial<GeneratorConfig>;
  count?: number;
  seed?: number;
  /** 모든 세트 생성에 걸리는 시간 제한 (기본 DEFAULT_RECOMMEND_TIMEOUT_MS) */
  timeoutMs?: number;
}

export interface RecommendResult {
  historySize: number;
  fallbackProfile: boolean;
  config: GeneratorConfig;
  sets: RejectionOutcome[];
  seed?: number;
  generatedAt: string;
}

/**
 * snapshot 의 설정/이력과 요청 override 를 합쳐 세트 생성
 * - 설정이나 history 가 바뀌면 profile 을 새로 만든다 (snapshot 은 건드리지 않음)
 */
export function recommendNumbers(
  snapshot: HistorySnapshot | null,
  options: RecommendOptions = {}
): RecommendResult {
  const hasOverrides =
    options.config !== undefined && Object.keys(options.config).length > 0;

  // 1️⃣ 설정 확정 + 검증 (샘플링 전에)
  const merged: Partial<GeneratorConfig> = {
    ...snapshot?.config,
    ...options.config,
  };
  // 범위만 바뀌면 구간은 새 범위 기준으로 다시 생성
  const rangeChanged =
    options.config?.minNumber !== undefined ||
    options.config?.maxNumber !== undefined;
  if (rangeChanged && options.config?.clusterIntervals === undefined) {
    delete merged.clusterIntervals;
  }
  const config = validateGeneratorConfig(resolveGeneratorConfig(merged));

  // 2️⃣ history (번호 형태가 바뀌면 캐시된 이력도 새 설정으로 다시 검증)
  const shapeChanged = rangeChanged || options.config?.drawSize !== undefined;
  let history: HistoryStore;
  if (options.history) {
    history = HistoryStore.fromDraws(options.history, config);
  } else if (snapshot && shapeChanged) {
    history = HistoryStore.fromDraws(snapshot.history.all(), config);
  } else {
    history = snapshot?.history ?? HistoryStore.empty(config.minNumber);
  }

  // 3️⃣ profile: snapshot 것을 그대로 쓸 수 있으면 재사용
  const profile: StatisticsProfile =
    snapshot && !options.history && !hasOverrides
      ? snapshot.profile
      : buildStatisticsProfile(history, config);

  const sets = generateSets(history, profile, config, options.count ?? 1, {
    random: createRandomSource(options.seed),
    deadline: Date.now() + (options.timeoutMs ?? DEFAULT_RECOMMEND_TIMEOUT_MS),
  });

  return {
    historySize: history.size,
    fallbackProfile: profile.fallback,
    config,
    sets,
    seed: options.seed,
    generatedAt: new Date().toISOString(),
  };
}

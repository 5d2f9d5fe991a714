import {
  AttemptTrace,
  Candidate,
  GeneratorConfig,
  RejectionOutcome,
  RejectionReason,
  RejectionTally,
  StatisticsProfile,
} from "../types/lotto";
import { HistoryStore } from "./historyStore";
import { FilterChain } from "./filterChain";
import { validateGeneratorConfig } from "./generatorConfig";
import { RandomSource, sampleCandidate } from "./candidateSampler";
import { patternScore, patternScoreBreakdown } from "./statisticsProfile";
import { numbersToBitmask } from "../utils/pattern";

export interface GenerateOptions {
  /** config.maxAttempts 대신 사용할 시도 횟수 */
  maxAttempts?: number;
  /** epoch ms. 넘으면 그 시점에서 exhausted */
  deadline?: number;
  random?: RandomSource;
  /** 이번 실행에서 추가로 제외할 조합 (이전에 뽑힌 세트 등) */
  exclude?: ReadonlyArray<readonly number[]>;
  onAttempt?: (trace: AttemptTrace) => void;
}

export function createRejectionTally(): RejectionTally {
  return {
    HistoricalDuplicate: 0,
    GenerationDuplicate: 0,
    OddEvenCheck: 0,
    SumRangeCheck: 0,
    GapCheck: 0,
    ConsecutiveRunCheck: 0,
    MultiplesCheck: 0,
    ClusterCheck: 0,
    PatternProbabilityCheck: 0,
  };
}

/**
 * 샘플링 → 과거 당첨 조합 제외 → 필터 체인 → 통과 시 반환
 * maxAttempts (또는 deadline) 안에 못 찾으면 exhausted
 */
export function generate(
  history: HistoryStore,
  profile: StatisticsProfile,
  config: GeneratorConfig,
  options: GenerateOptions = {}
): RejectionOutcome {
  validateGeneratorConfig(config);

  const maxAttempts = options.maxAttempts ?? config.maxAttempts;
  const random = options.random ?? Math.random;
  const chain = new FilterChain(profile, config.enabledChecks);
  const rejections = createRejectionTally();
  const trace: AttemptTrace[] | undefined = config.debug ? [] : undefined;

  // 이미 걸러진 조합 (+ 호출자가 넘긴 제외 목록)
  const tried = new Set<bigint>(
    (options.exclude ?? []).map((nums) =>
      numbersToBitmask(nums, config.minNumber)
    )
  );

  let lastRejection: RejectionReason | null = null;
  let attempts = 0;

  const record = (
    candidate: Candidate,
    rejectedBy: RejectionReason | null,
    detail?: string
  ) => {
    if (rejectedBy) {
      rejections[rejectedBy]++;
      lastRejection = rejectedBy;
    }
    if (!trace && !options.onAttempt) return;
    const entry: AttemptTrace = { attempt: attempts, candidate, rejectedBy };
    if (detail !== undefined) entry.detail = detail;
    trace?.push(entry);
    options.onAttempt?.(entry);
  };

  while (attempts < maxAttempts) {
    if (options.deadline !== undefined && Date.now() > options.deadline) {
      return {
        status: "exhausted",
        attempts,
        stoppedBy: "deadline",
        lastRejection,
        rejections,
        ...(trace ? { trace } : {}),
      };
    }

    attempts++;
    const candidate = sampleCandidate(
      config.minNumber,
      config.maxNumber,
      config.drawSize,
      random
    );

    // 1️⃣ 과거 당첨 조합과 동일 → 필터 없이 바로 skip
    if (history.contains(candidate)) {
      record(candidate, "HistoricalDuplicate");
      continue;
    }

    // 2️⃣ 이번 실행에서 이미 떨어진 조합
    const mask = numbersToBitmask(candidate, config.minNumber);
    if (tried.has(mask)) {
      record(candidate, "GenerationDuplicate");
      continue;
    }

    // 3️⃣ 필터 체인
    const result = chain.evaluate(candidate);
    if (!result.pass) {
      tried.add(mask);
      record(candidate, result.reason, result.detail);
      continue;
    }

    record(candidate, null);
    return {
      status: "accepted",
      candidate,
      score: patternScore(candidate, profile.positionalFrequency),
      patternScores: patternScoreBreakdown(
        candidate,
        profile.positionalFrequency
      ),
      attempts,
      rejections,
      ...(trace ? { trace } : {}),
    };
  }

  return {
    status: "exhausted",
    attempts,
    stoppedBy: "maxAttempts",
    lastRejection,
    rejections,
    ...(trace ? { trace } : {}),
  };
}

/**
 * 여러 세트 생성. 세트마다 독립 실행이며, 앞에서 뽑힌 조합은 뒤에서 제외
 */
export function generateSets(
  history: HistoryStore,
  profile: StatisticsProfile,
  config: GeneratorConfig,
  count: number,
  options: GenerateOptions = {}
): RejectionOutcome[] {
  const outcomes: RejectionOutcome[] = [];
  const accepted: Candidate[] = [...(options.exclude ?? [])];

  for (let i = 0; i < count; i++) {
    const outcome = generate(history, profile, config, {
      ...options,
      exclude: accepted,
    });
    outcomes.push(outcome);
    if (outcome.status === "accepted") accepted.push(outcome.candidate);
  }

  return outcomes;
}

import {
  CountRange,
  Draw,
  GeneratorConfig,
  StatisticsProfile,
} from "../types/lotto";
import { HistoryStore } from "./historyStore";
import {
  countMultiples,
  countOdd,
  maxGap,
  percentile,
  sumNumbers,
} from "../utils/lottoNumberUtils";
import { patternBuckets } from "../utils/pattern";

type PositionalFrequency = StatisticsProfile["positionalFrequency"];

/**
 * 정렬 위치별 출현 비율 평균
 * 예) [3, 11, ...] → (pos0 에서 3 의 비율 + pos1 에서 11 의 비율 + ...) / n
 */
export function patternScore(
  numbers: readonly number[],
  positionalFrequency: PositionalFrequency
): number {
  if (positionalFrequency.length === 0 || numbers.length === 0) return 0;
  let total = 0;
  numbers.forEach((n, pos) => {
    total += positionalFrequency[pos]?.[n] ?? 0;
  });
  return total / numbers.length;
}

/**
 * 앞에서부터 k 개 위치만 본 평균 비율 (k = n … 2)
 */
export function patternScoreBreakdown(
  numbers: readonly number[],
  positionalFrequency: PositionalFrequency
): Record<string, number> {
  const probs = numbers.map((n, pos) => positionalFrequency[pos]?.[n] ?? 0);
  const breakdown: Record<string, number> = {};
  for (let k = numbers.length; k >= 2; k--) {
    const slice = probs.slice(0, k);
    breakdown[`first${k}`] = sumNumbers(slice) / k;
  }
  return breakdown;
}

const ceilOr = (value: number | null, fallback: number) =>
  value === null ? fallback : Math.ceil(value);

const floorOr = (value: number | null, fallback: number) =>
  value === null ? fallback : Math.floor(value);

function fullSumRange(config: GeneratorConfig): CountRange {
  const n = config.drawSize;
  const triangle = (n * (n - 1)) / 2;
  return {
    min: n * config.minNumber + triangle,
    max: n * config.maxNumber - triangle,
  };
}

/**
 * history 부족 시 기본 프로필: 어떤 조합도 통계 조건 때문에 막히지 않음
 */
function buildFallbackProfile(
  history: HistoryStore,
  config: GeneratorConfig
): StatisticsProfile {
  const n = config.drawSize;

  return Object.freeze({
    drawCount: history.size,
    fallback: true,
    oddCountDistribution: Object.freeze({}),
    oddCounts: Object.freeze(Array.from({ length: n + 1 }, (_, i) => i)),
    sumRange: Object.freeze(fullSumRange(config)),
    maxGap: config.maxNumber - config.minNumber,
    multiplesCeiling: Object.freeze(
      Object.fromEntries(
        config.multiplesBases.map((base): [number, number] => [base, n])
      )
    ),
    clusterIntervals: Object.freeze([...config.clusterIntervals]),
    clusterBounds: Object.freeze(
      config.clusterIntervals.map(() => Object.freeze({ min: 0, max: n }))
    ),
    positionalFrequency: Object.freeze([]),
    averagePatternScore: 0,
    patternScoreFloor: 0,
    maxConsecutiveRun: config.maxConsecutiveRun,
  });
}

function buildPositionalFrequency(
  draws: readonly Draw[],
  drawSize: number
): PositionalFrequency {
  const counters = Array.from({ length: drawSize }, () => new Map<number, number>());

  for (const draw of draws) {
    draw.forEach((n, pos) => {
      counters[pos].set(n, (counters[pos].get(n) ?? 0) + 1);
    });
  }

  // 번호 오름차순으로 key 를 넣어 같은 입력이면 항상 같은 객체가 나오게 함
  return Object.freeze(
    counters.map((counter) =>
      Object.freeze(
        Object.fromEntries(
          [...counter.entries()]
            .sort((a, b) => a[0] - b[0])
            .map(([num, count]): [number, number] => [
              num,
              count / draws.length,
            ])
        )
      )
    )
  );
}

/**
 * HistoryStore 스냅샷 → 필터 기준값
 * 순수 함수: 같은 history + config 이면 항상 같은 결과
 */
export function buildStatisticsProfile(
  history: HistoryStore,
  config: GeneratorConfig
): StatisticsProfile {
  if (history.isEmpty() || history.size < config.minHistoryForDerivedStats) {
    return buildFallbackProfile(history, config);
  }

  const draws = history.all();
  const full = fullSumRange(config);

  // 1️⃣ 홀수 개수 분포 (관측된 값 그대로 사용)
  const oddCountDistribution: Record<number, number> = {};
  for (const draw of draws) {
    const odd = countOdd(draw);
    oddCountDistribution[odd] = (oddCountDistribution[odd] ?? 0) + 1;
  }
  const oddCounts = Object.keys(oddCountDistribution)
    .map(Number)
    .sort((a, b) => a - b);

  // 2️⃣ 합계 percentile 구간
  const sums = draws.map(sumNumbers);
  const sumRange: CountRange = {
    min: floorOr(percentile(sums, config.percentileLow), full.min),
    max: ceilOr(percentile(sums, config.percentileHigh), full.max),
  };

  // 3️⃣ 회차별 최대 간격의 percentile
  const gaps = draws.map(maxGap);
  const gapThreshold = ceilOr(
    percentile(gaps, config.gapPercentile),
    config.maxNumber - config.minNumber
  );

  // 4️⃣ 배수 개수 상한
  const multiplesCeiling: Record<number, number> = {};
  for (const base of config.multiplesBases) {
    const counts = draws.map((d) => countMultiples(d, base));
    multiplesCeiling[base] = ceilOr(
      percentile(counts, config.multiplesPercentile),
      config.drawSize
    );
  }

  // 5️⃣ 구간별 개수 범위 (관측 최소 ~ 최대)
  const bucketRows = draws.map((d) => patternBuckets(d, config.clusterIntervals));
  // spread 대신 루프: 회차 수가 많아도 인자 개수 제한에 걸리지 않음
  const clusterBounds = config.clusterIntervals.map((_, idx) => {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const row of bucketRows) {
      if (row[idx] < min) min = row[idx];
      if (row[idx] > max) max = row[idx];
    }
    return Object.freeze({ min, max });
  });

  // 6️⃣ 위치별 빈도 + 과거 회차 평균 점수
  const positionalFrequency = buildPositionalFrequency(draws, config.drawSize);
  const averagePatternScore =
    sumNumbers(draws.map((d) => patternScore(d, positionalFrequency))) /
    draws.length;

  return Object.freeze({
    drawCount: draws.length,
    fallback: false,
    oddCountDistribution: Object.freeze(oddCountDistribution),
    oddCounts: Object.freeze(oddCounts),
    sumRange: Object.freeze(sumRange),
    maxGap: gapThreshold,
    multiplesCeiling: Object.freeze(multiplesCeiling),
    clusterIntervals: Object.freeze([...config.clusterIntervals]),
    clusterBounds: Object.freeze(clusterBounds),
    positionalFrequency,
    averagePatternScore,
    patternScoreFloor: averagePatternScore * config.patternProbabilityMinRatio,
    maxConsecutiveRun: config.maxConsecutiveRun,
  });
}

import { CHECK_NAMES, GeneratorConfig } from "../types/lotto";
import { InvalidConfigurationError } from "./errors";
import { defaultClusterIntervals } from "../utils/pattern";

export const MULTIPLE_BASES = [2, 3, 4, 5, 6, 7, 8, 9, 10];

/**
 * 기본 설정 (6/45)
 */
export const DEFAULT_GENERATOR_CONFIG: Readonly<GeneratorConfig> = Object.freeze({
  drawSize: 6,
  minNumber: 1,
  maxNumber: 45,
  percentileLow: 0.15,
  percentileHigh: 0.85,
  gapPercentile: 0.95,
  multiplesPercentile: 1,
  clusterIntervals: defaultClusterIntervals(1, 45),
  multiplesBases: [...MULTIPLE_BASES],
  minHistoryForDerivedStats: 10,
  maxAttempts: 50_000,
  enabledChecks: [...CHECK_NAMES],
  patternProbabilityMinRatio: 0.5,
  maxConsecutiveRun: 2,
  debug: false,
});

/**
 * 기본값 위에 override 적용
 * 번호 범위를 바꾸고 구간을 지정하지 않으면 10 단위 구간을 새 범위로 다시 만든다
 */
export function resolveGeneratorConfig(
  overrides: Partial<GeneratorConfig> = {}
): GeneratorConfig {
  const minNumber = overrides.minNumber ?? DEFAULT_GENERATOR_CONFIG.minNumber;
  const maxNumber = overrides.maxNumber ?? DEFAULT_GENERATOR_CONFIG.maxNumber;

  return {
    ...DEFAULT_GENERATOR_CONFIG,
    ...overrides,
    minNumber,
    maxNumber,
    clusterIntervals: (
      overrides.clusterIntervals ?? defaultClusterIntervals(minNumber, maxNumber)
    ).map(([start, end]) => [start, end] as const),
    multiplesBases: [
      ...(overrides.multiplesBases ?? DEFAULT_GENERATOR_CONFIG.multiplesBases),
    ],
    enabledChecks: [
      ...(overrides.enabledChecks ?? DEFAULT_GENERATOR_CONFIG.enabledChecks),
    ],
  };
}

const isRatio = (v: number) => Number.isFinite(v) && v >= 0 && v <= 1;

export function collectConfigIssues(config: GeneratorConfig): string[] {
  const issues: string[] = [];
  const { drawSize, minNumber, maxNumber } = config;

  // 1️⃣ 번호 범위
  if (!Number.isInteger(minNumber) || !Number.isInteger(maxNumber)) {
    issues.push("minNumber/maxNumber 는 정수여야 합니다");
  } else if (minNumber > maxNumber) {
    issues.push("minNumber 는 maxNumber 이하여야 합니다");
  }
  if (!Number.isInteger(drawSize) || drawSize < 1) {
    issues.push("drawSize 는 1 이상의 정수여야 합니다");
  } else if (drawSize > maxNumber - minNumber + 1) {
    issues.push(
      `drawSize(${drawSize}) 가 번호 범위 크기(${maxNumber - minNumber + 1})보다 큽니다`
    );
  }

  // 2️⃣ percentile
  if (
    !isRatio(config.percentileLow) ||
    !isRatio(config.percentileHigh) ||
    config.percentileLow >= config.percentileHigh
  ) {
    issues.push("0 <= percentileLow < percentileHigh <= 1 이어야 합니다");
  }
  if (!isRatio(config.gapPercentile)) {
    issues.push("gapPercentile 은 0~1 이어야 합니다");
  }
  if (!isRatio(config.multiplesPercentile)) {
    issues.push("multiplesPercentile 은 0~1 이어야 합니다");
  }

  // 3️⃣ 구간: 빈틈 없이 전체 범위를 덮어야 함
  const intervals = config.clusterIntervals;
  if (intervals.length === 0) {
    issues.push("clusterIntervals 가 비어 있습니다");
  } else {
    let expected = minNumber;
    for (const [start, end] of intervals) {
      if (!Number.isInteger(start) || !Number.isInteger(end) || start > end) {
        issues.push(`잘못된 구간 [${start}, ${end}]`);
        break;
      }
      if (start !== expected) {
        issues.push(`구간 [${start}, ${end}] 앞에 빈틈 또는 겹침이 있습니다`);
        break;
      }
      expected = end + 1;
    }
    const last = intervals[intervals.length - 1];
    if (last[1] !== maxNumber) {
      issues.push(`clusterIntervals 가 maxNumber(${maxNumber}) 에서 끝나지 않습니다`);
    }
  }

  // 4️⃣ 배수
  const badBases = config.multiplesBases.filter(
    (b) => !MULTIPLE_BASES.includes(b)
  );
  if (badBases.length > 0) {
    issues.push(`multiplesBases 는 2~10 이어야 합니다: ${badBases.join(",")}`);
  }

  // 5️⃣ 기타
  if (
    !Number.isInteger(config.minHistoryForDerivedStats) ||
    config.minHistoryForDerivedStats < 0
  ) {
    issues.push("minHistoryForDerivedStats 는 0 이상의 정수여야 합니다");
  }
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    issues.push("maxAttempts 는 1 이상의 정수여야 합니다");
  }
  const knownChecks: readonly string[] = CHECK_NAMES;
  const unknownChecks = config.enabledChecks.filter(
    (c) => !knownChecks.includes(c)
  );
  if (unknownChecks.length > 0) {
    issues.push(`알 수 없는 check: ${unknownChecks.join(",")}`);
  }
  if (
    !Number.isFinite(config.patternProbabilityMinRatio) ||
    config.patternProbabilityMinRatio < 0
  ) {
    issues.push("patternProbabilityMinRatio 는 0 이상이어야 합니다");
  }
  if (!Number.isInteger(config.maxConsecutiveRun) || config.maxConsecutiveRun < 1) {
    issues.push("maxConsecutiveRun 은 1 이상의 정수여야 합니다");
  }

  return issues;
}

/**
 * 샘플링 전에 호출. 문제가 하나라도 있으면 전부 모아서 throw
 */
export function validateGeneratorConfig(config: GeneratorConfig): GeneratorConfig {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) throw new InvalidConfigurationError(issues);
  return config;
}

const envNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
};

/**
 * process.env → 설정 override
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GeneratorConfig {
  const overrides: Partial<GeneratorConfig> = {};

  const drawSize = envNumber(env.DRAW_SIZE);
  const minNumber = envNumber(env.MIN_NUMBER);
  const maxNumber = envNumber(env.MAX_NUMBER);
  const maxAttempts = envNumber(env.GENERATOR_MAX_ATTEMPTS);
  const minHistory = envNumber(env.MIN_HISTORY);

  if (drawSize !== undefined) overrides.drawSize = drawSize;
  if (minNumber !== undefined) overrides.minNumber = minNumber;
  if (maxNumber !== undefined) overrides.maxNumber = maxNumber;
  if (maxAttempts !== undefined) overrides.maxAttempts = maxAttempts;
  if (minHistory !== undefined) overrides.minHistoryForDerivedStats = minHistory;
  if (env.GENERATOR_DEBUG !== undefined) {
    overrides.debug = env.GENERATOR_DEBUG === "true";
  }

  return validateGeneratorConfig(resolveGeneratorConfig(overrides));
}

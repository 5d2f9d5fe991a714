import {
  CHECK_NAMES,
  Candidate,
  CheckName,
  PassResult,
  StatisticsProfile,
} from "../types/lotto";
import {
  countMultiples,
  countOdd,
  maxConsecutiveRun,
  maxGap,
  sumNumbers,
} from "../utils/lottoNumberUtils";
import { patternBuckets } from "../utils/pattern";
import { patternScore } from "./statisticsProfile";

/**
 * 실패 시 사유 문자열, 통과 시 null
 * candidate 는 오름차순 정렬되어 있다고 가정
 */
export type CandidateCheck = (
  candidate: Candidate,
  profile: StatisticsProfile
) => string | null;

export const oddEvenCheck: CandidateCheck = (candidate, profile) => {
  const odd = countOdd(candidate);
  return profile.oddCounts.includes(odd)
    ? null
    : `홀수 ${odd}개 (허용: ${profile.oddCounts.join(",")})`;
};

export const sumRangeCheck: CandidateCheck = (candidate, profile) => {
  const sum = sumNumbers(candidate);
  const { min, max } = profile.sumRange;
  return sum >= min && sum <= max ? null : `합계 ${sum} (허용: ${min}~${max})`;
};

export const gapCheck: CandidateCheck = (candidate, profile) => {
  const gap = maxGap(candidate);
  return gap <= profile.maxGap ? null : `최대 간격 ${gap} > ${profile.maxGap}`;
};

export const consecutiveRunCheck: CandidateCheck = (candidate, profile) => {
  const run = maxConsecutiveRun(candidate);
  return run <= profile.maxConsecutiveRun
    ? null
    : `연번 ${run}개 > ${profile.maxConsecutiveRun}`;
};

export const multiplesCheck: CandidateCheck = (candidate, profile) => {
  for (const [base, ceiling] of Object.entries(profile.multiplesCeiling)) {
    const count = countMultiples(candidate, Number(base));
    if (count > ceiling) return `${base}의 배수 ${count}개 > ${ceiling}`;
  }
  return null;
};

export const clusterCheck: CandidateCheck = (candidate, profile) => {
  const buckets = patternBuckets(candidate, profile.clusterIntervals);
  for (let i = 0; i < buckets.length; i++) {
    const bound = profile.clusterBounds[i];
    if (!bound) continue;
    if (buckets[i] < bound.min || buckets[i] > bound.max) {
      const [start, end] = profile.clusterIntervals[i];
      return `${start}~${end} 구간 ${buckets[i]}개 (허용: ${bound.min}~${bound.max})`;
    }
  }
  return null;
};

export const patternProbabilityCheck: CandidateCheck = (candidate, profile) => {
  const score = patternScore(candidate, profile.positionalFrequency);
  return score >= profile.patternScoreFloor
    ? null
    : `패턴 점수 ${score.toFixed(4)} < ${profile.patternScoreFloor.toFixed(4)}`;
};

/**
 * 평가 순서 = CHECK_NAMES 순서 (가볍고 잘 걸러내는 것부터)
 */
export const CHECKS: Record<CheckName, CandidateCheck> = {
  OddEvenCheck: oddEvenCheck,
  SumRangeCheck: sumRangeCheck,
  GapCheck: gapCheck,
  ConsecutiveRunCheck: consecutiveRunCheck,
  MultiplesCheck: multiplesCheck,
  ClusterCheck: clusterCheck,
  PatternProbabilityCheck: patternProbabilityCheck,
};

export function evaluateCandidate(
  candidate: Candidate,
  profile: StatisticsProfile,
  enabledChecks: readonly CheckName[] = CHECK_NAMES
): PassResult {
  for (const name of CHECK_NAMES) {
    if (!enabledChecks.includes(name)) continue;
    const detail = CHECKS[name](candidate, profile);
    if (detail !== null) return { pass: false, reason: name, detail };
  }
  return { pass: true };
}

/**
 * profile + 활성화된 check 목록을 묶어 둔 필터 체인
 */
export class FilterChain {
  private readonly order: CheckName[];

  constructor(
    public readonly profile: StatisticsProfile,
    enabledChecks: readonly CheckName[] = CHECK_NAMES
  ) {
    this.order = CHECK_NAMES.filter((name) => enabledChecks.includes(name));
  }

  evaluate(candidate: Candidate): PassResult {
    return evaluateCandidate(candidate, this.profile, this.order);
  }
}

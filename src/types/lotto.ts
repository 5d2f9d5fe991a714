// 당첨 번호 / 후보 번호는 항상 오름차순 정렬된 배열
export type Draw = readonly number[];
export type Candidate = readonly number[];

export interface HistoricalDraw {
  round?: number;
  date?: string;
  numbers: number[];
}

export const CHECK_NAMES = [
  "OddEvenCheck",
  "SumRangeCheck",
  "GapCheck",
  "ConsecutiveRunCheck",
  "MultiplesCheck",
  "ClusterCheck",
  "PatternProbabilityCheck",
] as const;

export type CheckName = (typeof CHECK_NAMES)[number];

export type RejectionReason =
  | CheckName
  | "HistoricalDuplicate"
  | "GenerationDuplicate";

export type ClusterInterval = readonly [start: number, end: number];

export interface GeneratorConfig {
  drawSize: number;
  minNumber: number;
  maxNumber: number;
  percentileLow: number;
  percentileHigh: number;
  gapPercentile: number;
  multiplesPercentile: number;
  clusterIntervals: ClusterInterval[];
  multiplesBases: number[];
  minHistoryForDerivedStats: number;
  maxAttempts: number;
  enabledChecks: CheckName[];
  patternProbabilityMinRatio: number;
  maxConsecutiveRun: number;
  debug: boolean;
}

export interface CountRange {
  min: number;
  max: number;
}

export interface StatisticsProfile {
  drawCount: number;
  /** history 가 부족해 기본값으로 만들어진 프로필인지 여부 */
  fallback: boolean;
  /** 홀수 개수 → 관측 횟수 */
  oddCountDistribution: Readonly<Record<number, number>>;
  oddCounts: readonly number[];
  sumRange: Readonly<CountRange>;
  maxGap: number;
  multiplesCeiling: Readonly<Record<number, number>>;
  clusterIntervals: readonly ClusterInterval[];
  clusterBounds: readonly Readonly<CountRange>[];
  /** [정렬 위치][번호] → 출현 비율 (0~1) */
  positionalFrequency: readonly Readonly<Record<number, number>>[];
  averagePatternScore: number;
  patternScoreFloor: number;
  maxConsecutiveRun: number;
}

export type PassResult =
  | { pass: true }
  | { pass: false; reason: CheckName; detail: string };

export type RejectionTally = Record<RejectionReason, number>;

export interface AttemptTrace {
  attempt: number;
  candidate: Candidate;
  rejectedBy: RejectionReason | null;
  detail?: string;
}

export interface AcceptedOutcome {
  status: "accepted";
  candidate: Candidate;
  score: number;
  patternScores: Record<string, number>;
  attempts: number;
  rejections: RejectionTally;
  trace?: AttemptTrace[];
}

export interface ExhaustedOutcome {
  status: "exhausted";
  attempts: number;
  stoppedBy: "maxAttempts" | "deadline";
  lastRejection: RejectionReason | null;
  rejections: RejectionTally;
  trace?: AttemptTrace[];
}

export type RejectionOutcome = AcceptedOutcome | ExhaustedOutcome;

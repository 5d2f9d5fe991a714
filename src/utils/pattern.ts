import type { ClusterInterval } from "../types/lotto";

// 번호 조합 → bitmask (번호 순서와 무관하게 같은 조합이면 같은 값)
export function numbersToBitmask(numbers: readonly number[], base = 1): bigint {
  let mask = 0n;
  for (const n of numbers) mask |= 1n << BigInt(n - base);
  return mask;
}

/**
 * 구간별 번호 개수
 * intervals 는 [start, end] (양 끝 포함) 목록
 */
export function patternBuckets(
  numbers: readonly number[],
  intervals: readonly ClusterInterval[]
): number[] {
  const buckets = new Array<number>(intervals.length).fill(0);
  for (const n of numbers) {
    const idx = intervals.findIndex(([start, end]) => n >= start && n <= end);
    if (idx >= 0) buckets[idx]++;
  }
  return buckets;
}

/**
 * unitSize 단위로 자른 기본 구간 (마지막 구간은 maxNumber 에서 끝남)
 * 예) 1~45, 10 → [1,10] [11,20] [21,30] [31,40] [41,45]
 */
export function defaultClusterIntervals(
  minNumber: number,
  maxNumber: number,
  unitSize = 10
): ClusterInterval[] {
  const intervals: ClusterInterval[] = [];
  for (let start = minNumber; start <= maxNumber; start += unitSize) {
    intervals.push([start, Math.min(start + unitSize - 1, maxNumber)]);
  }
  return intervals;
}

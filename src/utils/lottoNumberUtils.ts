export function sortNumbers(numbers: readonly number[]): number[] {
  return [...numbers].sort((a, b) => a - b);
}

export function sumNumbers(numbers: readonly number[]): number {
  return numbers.reduce((acc, n) => acc + n, 0);
}

export function countOdd(numbers: readonly number[]): number {
  return numbers.filter((n) => n % 2 !== 0).length;
}

export function countMultiples(numbers: readonly number[], base: number): number {
  return numbers.filter((n) => n % base === 0).length;
}

/**
 * 정렬된 번호에서 인접한 두 번호 간 최대 간격
 */
export function maxGap(sorted: readonly number[]): number {
  let gap = 0;
  for (let i = 1; i < sorted.length; i++) {
    gap = Math.max(gap, sorted[i] - sorted[i - 1]);
  }
  return gap;
}

/**
 * 정렬된 번호에서 가장 긴 연번 길이 (예: 7,8,9 → 3)
 */
export function maxConsecutiveRun(sorted: readonly number[]): number {
  if (sorted.length === 0) return 0;
  let best = 1;
  let run = 1;
  for (let i = 1; i < sorted.length; i++) {
    run = sorted[i] === sorted[i - 1] + 1 ? run + 1 : 1;
    best = Math.max(best, run);
  }
  return best;
}

/**
 * 선형 보간 percentile (p: 0~1)
 * 빈 배열이면 null
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = sortNumbers(values);
  const rank = p * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

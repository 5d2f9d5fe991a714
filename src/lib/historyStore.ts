import { Draw, HistoricalDraw } from "../types/lotto";
import { InvalidHistoryError } from "./errors";
import { numbersToBitmask } from "../utils/pattern";
import { sortNumbers } from "../utils/lottoNumberUtils";

interface DrawShape {
  drawSize: number;
  minNumber: number;
  maxNumber: number;
}

/**
 * 과거 당첨 번호 (입력 순서 유지, 읽기 전용)
 * - 중복 제거는 하지 않음 (수집기 책임)
 * - 같은 조합 여부는 bitmask Set 으로 O(1) 조회
 */
export class HistoryStore {
  private readonly draws: readonly Draw[];
  private readonly masks: ReadonlySet<bigint>;

  private constructor(draws: Draw[], private readonly minNumber: number) {
    this.draws = Object.freeze(draws.map((d) => Object.freeze([...d])));
    this.masks = new Set(draws.map((d) => numbersToBitmask(d, minNumber)));
  }

  static empty(minNumber = 1): HistoryStore {
    return new HistoryStore([], minNumber);
  }

  /**
   * 번호 배열 목록 → HistoryStore
   * 각 회차는 drawSize 개의 서로 다른 정수, [minNumber, maxNumber] 범위여야 함
   */
  static fromDraws(
    draws: ReadonlyArray<readonly number[] | HistoricalDraw>,
    shape: DrawShape
  ): HistoryStore {
    const issues: string[] = [];
    const sorted: Draw[] = [];

    draws.forEach((item, index) => {
      const numbers = "numbers" in item ? item.numbers : item;
      const label =
        "numbers" in item && item.round !== undefined
          ? `${item.round}회`
          : `#${index}`;

      if (numbers.length !== shape.drawSize) {
        issues.push(`${label}: 번호 개수 ${numbers.length} (필요: ${shape.drawSize})`);
        return;
      }
      if (
        numbers.some(
          (n) =>
            !Number.isInteger(n) || n < shape.minNumber || n > shape.maxNumber
        )
      ) {
        issues.push(
          `${label}: ${shape.minNumber}~${shape.maxNumber} 범위 밖의 번호 포함`
        );
        return;
      }
      if (new Set(numbers).size !== numbers.length) {
        issues.push(`${label}: 중복 번호 포함`);
        return;
      }
      sorted.push(sortNumbers(numbers));
    });

    if (issues.length > 0) throw new InvalidHistoryError(issues);

    return new HistoryStore(sorted, shape.minNumber);
  }

  get size(): number {
    return this.draws.length;
  }

  isEmpty(): boolean {
    return this.draws.length === 0;
  }

  all(): readonly Draw[] {
    return this.draws;
  }

  latest(): Draw | undefined {
    return this.draws[this.draws.length - 1];
  }

  /**
   * 같은 번호 조합이 과거에 나왔는지 (순서 무관)
   */
  contains(numbers: readonly number[]): boolean {
    return this.masks.has(numbersToBitmask(numbers, this.minNumber));
  }
}

import { Candidate } from "../types/lotto";
import { InvalidRangeError } from "./errors";

export type RandomSource = () => number;

// -----------------------------
// Seeded Random 구현 (Park–Miller)
// 상태는 항상 1 ~ M-1, next() 는 [0, 1)
// -----------------------------
const MODULUS = 2147483647;

export class SeededRandom {
  private state: number;
  constructor(seed: number) {
    // 음수/0/M 배수 seed 도 유효한 상태로 맞춤
    const normalized = ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
    this.state = Number.isFinite(normalized) && normalized !== 0 ? normalized : 1;
  }

  next(): number {
    this.state = (this.state * 16807) % MODULUS;
    return (this.state - 1) / (MODULUS - 1);
  }
}

export function createRandomSource(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;
  const rng = new SeededRandom(seed);
  return () => rng.next();
}

/**
 * [minNumber, maxNumber] 에서 서로 다른 번호 count 개를 균등 추출 (오름차순)
 * 부분 Fisher–Yates 셔플
 */
export function sampleCandidate(
  minNumber: number,
  maxNumber: number,
  count: number,
  random: RandomSource = Math.random
): Candidate {
  const size = maxNumber - minNumber + 1;
  if (
    !Number.isInteger(minNumber) ||
    !Number.isInteger(maxNumber) ||
    !Number.isInteger(count) ||
    count < 0 ||
    size < count
  ) {
    throw new InvalidRangeError(minNumber, maxNumber, count);
  }

  const pool = Array.from({ length: size }, (_, i) => minNumber + i);
  for (let i = 0; i < count; i++) {
    // random() 이 1 을 돌려주는 소스여도 pool 밖을 읽지 않도록
    const offset = Math.min(Math.floor(random() * (size - i)), size - i - 1);
    const j = i + Math.max(offset, 0);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, count).sort((a, b) => a - b);
}

import { describe, it, expect } from "vitest";
import { HistoryStore } from "../historyStore";
import { resolveGeneratorConfig } from "../generatorConfig";
import {
  buildStatisticsProfile,
  patternScore,
  patternScoreBreakdown,
} from "../statisticsProfile";

const config = resolveGeneratorConfig({ minHistoryForDerivedStats: 1 });

const history = HistoryStore.fromDraws(
  [
    [1, 2, 3, 4, 5, 6],
    [5, 10, 15, 20, 25, 30],
    [2, 4, 13, 24, 36, 45],
  ],
  config
);

describe("buildStatisticsProfile", () => {
  const profile = buildStatisticsProfile(history, config);

  it("uses the observed odd counts as the accepted set", () => {
    expect(profile.fallback).toBe(false);
    expect(profile.drawCount).toBe(3);
    expect(profile.oddCountDistribution).toEqual({ 2: 1, 3: 2 });
    expect(profile.oddCounts).toEqual([2, 3]);
  });

  it("derives the sum range from percentiles", () => {
    // sums 21, 105, 124 → 15th ≈ 46.2, 85th ≈ 118.3
    expect(profile.sumRange).toEqual({ min: 46, max: 119 });
  });

  it("derives the gap threshold from per-draw maximum gaps", () => {
    // max gaps 1, 5, 12 → 95th ≈ 11.3
    expect(profile.maxGap).toBe(12);
  });

  it("uses the maximum observed multiples count by default", () => {
    expect(profile.multiplesCeiling[2]).toBe(4);
    expect(profile.multiplesCeiling[3]).toBe(3);
    expect(profile.multiplesCeiling[5]).toBe(6);
    expect(profile.multiplesCeiling[7]).toBe(0);
    expect(profile.multiplesCeiling[10]).toBe(3);
  });

  it("uses the multiples percentile when configured", () => {
    const p = buildStatisticsProfile(
      history,
      resolveGeneratorConfig({ minHistoryForDerivedStats: 1, multiplesPercentile: 0 })
    );
    expect(p.multiplesCeiling[2]).toBe(3);
    expect(p.multiplesCeiling[5]).toBe(1);
  });

  it("derives cluster bounds per interval", () => {
    expect(profile.clusterBounds).toEqual([
      { min: 2, max: 6 },
      { min: 0, max: 2 },
      { min: 0, max: 2 },
      { min: 0, max: 1 },
      { min: 0, max: 1 },
    ]);
  });

  it("builds the positional frequency table", () => {
    expect(profile.positionalFrequency).toHaveLength(6);
    expect(profile.positionalFrequency[0]).toEqual({ 1: 1 / 3, 2: 1 / 3, 5: 1 / 3 });
    expect(profile.positionalFrequency[5][45]).toBeCloseTo(1 / 3, 12);
    expect(profile.averagePatternScore).toBeCloseTo(1 / 3, 12);
    expect(profile.patternScoreFloor).toBeCloseTo(1 / 6, 12);
  });

  it("is deterministic", () => {
    expect(buildStatisticsProfile(history, config)).toEqual(profile);
  });

  it("is immutable", () => {
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.sumRange)).toBe(true);
    expect(Object.isFrozen(profile.positionalFrequency[0])).toBe(true);
  });
});

describe("fallback profile", () => {
  it("is permissive for an empty history", () => {
    const profile = buildStatisticsProfile(HistoryStore.empty(), config);

    expect(profile.fallback).toBe(true);
    expect(profile.oddCounts).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(profile.sumRange).toEqual({ min: 21, max: 255 });
    expect(profile.maxGap).toBe(44);
    expect(profile.multiplesCeiling[2]).toBe(6);
    expect(profile.clusterBounds.every((b) => b.min === 0 && b.max === 6)).toBe(true);
    expect(profile.positionalFrequency).toEqual([]);
    expect(profile.patternScoreFloor).toBe(0);
  });

  it("is used while the history is below the configured minimum", () => {
    const profile = buildStatisticsProfile(
      history,
      resolveGeneratorConfig({ minHistoryForDerivedStats: 10 })
    );
    expect(profile.fallback).toBe(true);
    expect(profile.drawCount).toBe(3);
  });
});

describe("buildStatisticsProfile with a large history", () => {
  it("derives cluster bounds without overflowing the call stack", () => {
    const draws = Array.from({ length: 140_000 }, (_, k) =>
      k % 2 === 0 ? [1, 2, 21, 31, 41, 45] : [1, 11, 21, 31, 41, 45]
    );
    const profile = buildStatisticsProfile(
      HistoryStore.fromDraws(draws, config),
      config
    );

    expect(profile.drawCount).toBe(140_000);
    expect(profile.clusterBounds).toEqual([
      { min: 1, max: 2 },
      { min: 0, max: 1 },
      { min: 1, max: 1 },
      { min: 1, max: 1 },
      { min: 2, max: 2 },
    ]);
  });
});

describe("patternScore", () => {
  const table: Record<number, number>[] = [{ 1: 0.5, 2: 0.5 }, { 3: 1 }];

  it("averages the positional frequencies", () => {
    expect(patternScore([1, 3], table)).toBe(0.75);
    expect(patternScore([2, 4], table)).toBe(0.25);
    expect(patternScore([1, 3], [])).toBe(0);
  });

  it("reports prefix averages", () => {
    expect(patternScoreBreakdown([1, 3, 9], [...table, {}])).toEqual({
      first3: 0.5,
      first2: 0.75,
    });
  });
});

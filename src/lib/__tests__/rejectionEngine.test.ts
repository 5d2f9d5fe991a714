import { describe, it, expect, vi } from "vitest";
import { countOdd } from "../../utils/lottoNumberUtils";
import { HistoryStore } from "../historyStore";
import { resolveGeneratorConfig } from "../generatorConfig";
import { buildStatisticsProfile } from "../statisticsProfile";
import { evaluateCandidate } from "../filterChain";
import { createRandomSource, sampleCandidate } from "../candidateSampler";
import { InvalidConfigurationError } from "../errors";
import { generate, generateSets } from "../rejectionEngine";

// 6개 중 하나를 뺀 조합: 1~7 에서 6개 → 7가지
const combosOfSeven = [1, 2, 3, 4, 5, 6, 7].map((skip) =>
  [1, 2, 3, 4, 5, 6, 7].filter((n) => n !== skip)
);

describe("generate", () => {
  const config = resolveGeneratorConfig();
  const seedRandom = createRandomSource(2024);
  const history = HistoryStore.fromDraws(
    Array.from({ length: 40 }, () => sampleCandidate(1, 45, 6, seedRandom)),
    config
  );
  const profile = buildStatisticsProfile(history, config);

  it("accepts a candidate that passes every enabled check", () => {
    const outcome = generate(history, profile, config, {
      random: createRandomSource(42),
    });

    expect(profile.fallback).toBe(false);
    expect(outcome.status).toBe("accepted");
    if (outcome.status !== "accepted") return;

    const { candidate } = outcome;
    expect(candidate).toHaveLength(6);
    expect(new Set(candidate).size).toBe(6);
    expect(candidate.every((n) => n >= 1 && n <= 45)).toBe(true);
    expect(history.contains(candidate)).toBe(false);
    expect(evaluateCandidate(candidate, profile, config.enabledChecks)).toEqual({
      pass: true,
    });
    expect(Object.keys(outcome.patternScores)).toEqual([
      "first6",
      "first5",
      "first4",
      "first3",
      "first2",
    ]);
    expect(outcome.score).toBeGreaterThanOrEqual(profile.patternScoreFloor);
    expect(outcome.attempts).toBeGreaterThanOrEqual(1);
  });

  it("tallies rejections up to the accepted attempt", () => {
    const outcome = generate(history, profile, config, {
      random: createRandomSource(99),
    });
    const rejected = Object.values(outcome.rejections).reduce((a, b) => a + b, 0);
    expect(outcome.status).toBe("accepted");
    expect(rejected).toBe(outcome.attempts - 1);
  });

  it("exhausts after one attempt when the sum range is unreachable", () => {
    const tight = { ...profile, sumRange: { min: 6, max: 6 } };
    const outcome = generate(history, tight, { ...config, maxAttempts: 1 });

    expect(outcome.status).toBe("exhausted");
    expect(outcome.attempts).toBe(1);
    if (outcome.status === "exhausted") {
      expect(outcome.stoppedBy).toBe("maxAttempts");
    }
  });

  it("lets the caller override the attempt limit", () => {
    const tight = { ...profile, sumRange: { min: 6, max: 6 } };
    const outcome = generate(history, tight, config, { maxAttempts: 3 });
    expect(outcome.status).toBe("exhausted");
    expect(outcome.attempts).toBe(3);
  });

  it("stops at the deadline", () => {
    const outcome = generate(history, profile, config, { deadline: Date.now() - 1 });
    expect(outcome).toMatchObject({
      status: "exhausted",
      attempts: 0,
      stoppedBy: "deadline",
      lastRejection: null,
    });
  });

  it("succeeds with an empty history using fallback defaults", () => {
    const empty = HistoryStore.empty();
    const fallback = buildStatisticsProfile(empty, config);
    const outcome = generate(empty, fallback, config, {
      random: createRandomSource(5),
    });

    expect(fallback.fallback).toBe(true);
    expect(outcome.status).toBe("accepted");
  });

  it("validates the configuration before sampling", () => {
    const random = vi.fn(() => 0.5);
    const bad = { ...config, percentileLow: 0.9, percentileHigh: 0.1 };

    expect(() => generate(history, profile, bad, { random })).toThrow(
      InvalidConfigurationError
    );
    expect(random).not.toHaveBeenCalled();
  });

  it("never returns a historical draw", () => {
    const small = resolveGeneratorConfig({ maxNumber: 7, enabledChecks: [] });
    const past = HistoryStore.fromDraws(
      combosOfSeven.filter((c) => c.includes(7)),
      small
    );
    const outcome = generate(past, buildStatisticsProfile(past, small), small, {
      random: createRandomSource(3),
    });

    expect(past.size).toBe(6);
    expect(outcome.status).toBe("accepted");
    if (outcome.status !== "accepted") return;
    expect(outcome.candidate).toEqual([1, 2, 3, 4, 5, 6]);
    expect(outcome.rejections.HistoricalDuplicate).toBe(outcome.attempts - 1);
  });

  describe("when the draw size equals the range size", () => {
    it("returns the only combination when no check rejects it", () => {
      const exact = resolveGeneratorConfig({ maxNumber: 6, enabledChecks: [] });
      const empty = HistoryStore.empty();
      const outcome = generate(empty, buildStatisticsProfile(empty, exact), exact);

      expect(outcome).toMatchObject({
        status: "accepted",
        candidate: [1, 2, 3, 4, 5, 6],
        attempts: 1,
      });
    });

    it("exhausts without sampler errors when a check rejects it", () => {
      const exact = resolveGeneratorConfig({ maxNumber: 6, maxAttempts: 5 });
      const empty = HistoryStore.empty();
      const outcome = generate(empty, buildStatisticsProfile(empty, exact), exact);

      expect(outcome.status).toBe("exhausted");
      expect(outcome.attempts).toBe(5);
      expect(outcome.rejections.ConsecutiveRunCheck).toBe(1);
      expect(outcome.rejections.GenerationDuplicate).toBe(4);
      if (outcome.status === "exhausted") {
        expect(outcome.lastRejection).toBe("GenerationDuplicate");
      }
    });
  });

  describe("debug mode", () => {
    it("records every attempt without changing the result", () => {
      const plain = generate(history, profile, config, {
        random: createRandomSource(77),
      });
      const traced = generate(
        history,
        profile,
        { ...config, debug: true },
        { random: createRandomSource(77) }
      );

      expect(plain.trace).toBeUndefined();
      expect(traced.attempts).toBe(plain.attempts);
      expect(traced.status).toBe(plain.status);
      if (traced.status === "accepted" && plain.status === "accepted") {
        expect(traced.candidate).toEqual(plain.candidate);
      }
      expect(traced.trace).toHaveLength(traced.attempts);
      expect(traced.trace?.[traced.attempts - 1].rejectedBy).toBeNull();
    });

    it("reports OddEvenCheck for candidates with an unseen odd count", () => {
      const scenario = resolveGeneratorConfig({
        maxNumber: 49,
        percentileLow: 0,
        percentileHigh: 1,
        minHistoryForDerivedStats: 1,
        maxAttempts: 300,
        debug: true,
      });
      const single = HistoryStore.fromDraws([[1, 2, 3, 4, 5, 6]], scenario);
      const outcome = generate(
        single,
        buildStatisticsProfile(single, scenario),
        scenario,
        { random: createRandomSource(11) }
      );

      expect(outcome.status).toBe("exhausted");
      expect(outcome.rejections.OddEvenCheck).toBeGreaterThan(0);

      const evaluated = (outcome.trace ?? []).filter(
        (t) =>
          t.rejectedBy !== "HistoricalDuplicate" &&
          t.rejectedBy !== "GenerationDuplicate"
      );
      for (const t of evaluated) {
        if (countOdd(t.candidate) !== 3) expect(t.rejectedBy).toBe("OddEvenCheck");
      }
    });

    it("calls onAttempt once per attempt", () => {
      const onAttempt = vi.fn();
      const outcome = generate(history, profile, config, {
        random: createRandomSource(8),
        onAttempt,
      });
      expect(onAttempt).toHaveBeenCalledTimes(outcome.attempts);
    });
  });
});

describe("generateSets", () => {
  it("does not repeat a combination across sets", () => {
    const small = resolveGeneratorConfig({
      maxNumber: 7,
      enabledChecks: [],
      maxAttempts: 2000,
    });
    const empty = HistoryStore.empty();
    const outcomes = generateSets(
      empty,
      buildStatisticsProfile(empty, small),
      small,
      8,
      { random: createRandomSource(21) }
    );

    const accepted = outcomes.flatMap((o) =>
      o.status === "accepted" ? [o.candidate.join("-")] : []
    );
    expect(accepted).toHaveLength(7);
    expect(new Set(accepted).size).toBe(7);
    expect(outcomes[7].status).toBe("exhausted");
  });
});

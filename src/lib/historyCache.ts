import { readFile } from "node:fs/promises";
import path from "node:path";
import { GeneratorConfig, StatisticsProfile } from "../types/lotto";
import { HistoryStore } from "./historyStore";
import { buildStatisticsProfile } from "./statisticsProfile";
import { InvalidHistoryError } from "./errors";
import {
  formatZodError,
  historyFileSchema,
  HistoryFileInput,
} from "../utils/requestUtils";

export interface HistorySnapshot {
  history: HistoryStore;
  profile: StatisticsProfile;
  config: GeneratorConfig;
  source: string | null;
  builtAt: Date;
}

// 서버 전체에서 공유하는 스냅샷. 갱신은 항상 통째로 교체
let snapshot: HistorySnapshot | null = null;

export const resolveHistoryFile = (file = process.env.HISTORY_FILE) =>
  path.resolve(process.cwd(), file || "data/history.json");

export function parseHistoryFile(
  raw: unknown,
  config: GeneratorConfig
): HistoryStore {
  const parsed = historyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidHistoryError([formatZodError(parsed.error)]);
  }
  const input: HistoryFileInput = parsed.data;
  const draws = Array.isArray(input) ? input : input.draws;
  return HistoryStore.fromDraws(draws, config);
}

export async function loadHistoryFile(
  filePath: string,
  config: GeneratorConfig
): Promise<HistoryStore> {
  const text = await readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidHistoryError([`${filePath}: JSON 파싱 실패 (${reason})`]);
  }
  return parseHistoryFile(raw, config);
}

/**
 * history → profile 을 새로 만들어 스냅샷 교체
 */
export function replaceSnapshot(
  history: HistoryStore,
  config: GeneratorConfig,
  source: string | null = null
): HistorySnapshot {
  snapshot = Object.freeze({
    history,
    profile: buildStatisticsProfile(history, config),
    config,
    source,
    builtAt: new Date(),
  });
  return snapshot;
}

export async function initializeHistoryCache(
  config: GeneratorConfig,
  filePath = resolveHistoryFile()
): Promise<HistorySnapshot> {
  console.log(">>> 당첨 이력 캐싱 시작", filePath);

  const history = await loadHistoryFile(filePath, config);
  const next = replaceSnapshot(history, config, filePath);

  console.log(
    `>>> 총 ${history.size}개 회차 캐싱 완료 (fallback profile: ${next.profile.fallback})`
  );
  return next;
}

export function getHistorySnapshot(): HistorySnapshot | null {
  return snapshot;
}

export function clearHistoryCache() {
  snapshot = null;
}

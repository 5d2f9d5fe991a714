import cron from "node-cron";
import {
  getHistorySnapshot,
  HistorySnapshot,
  initializeHistoryCache,
  resolveHistoryFile,
} from "../lib/historyCache";
import { configFromEnv } from "../lib/generatorConfig";

/**
 * 이력 파일을 다시 읽고 profile 을 처음부터 재생성
 * (기존 profile 을 부분 수정하지 않음)
 */
export async function rebuildHistoryCache(): Promise<HistorySnapshot> {
  const current = getHistorySnapshot();
  const config = current?.config ?? configFromEnv();
  const source = current?.source ?? resolveHistoryFile();
  return initializeHistoryCache(config, source);
}

export async function autoReloadHistory() {
  try {
    const before = getHistorySnapshot()?.history.size ?? 0;
    const snapshot = await rebuildHistoryCache();

    console.log(
      `[${new Date().toLocaleString()}] Profile rebuilt: ${before} → ${snapshot.history.size} draws`
    );
  } catch (err) {
    // 실패해도 기존 snapshot 유지
    console.error(
      `[${new Date().toLocaleString()}] Error rebuilding profile:`,
      err
    );
  }
}

/**
 * node-cron 기반 스케줄러
 * 기본: 매주 토요일 21:10
 */
export function scheduleHistoryReload() {
  const expression = process.env.HISTORY_RELOAD_CRON || "10 21 * * 6";
  const timezone = process.env.HISTORY_RELOAD_TZ || "Asia/Seoul";

  if (!cron.validate(expression)) {
    console.error(`❌ 잘못된 HISTORY_RELOAD_CRON: ${expression}`);
    return null;
  }

  const task = cron.schedule(
    expression,
    async () => {
      console.log(`[CRON] History reload started: ${new Date().toLocaleString()}`);
      await autoReloadHistory();
    },
    { timezone }
  );

  console.log(`✅ history reload cron registered (${expression}, ${timezone})`);
  return task;
}

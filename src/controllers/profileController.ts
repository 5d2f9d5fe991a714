import { Request, Response } from "express";
import { ApiResponse } from "../types/api";
import { getHistorySnapshot } from "../lib/historyCache";
import { rebuildHistoryCache } from "../scheduler/historyAutoReload";
import { sendError } from "../utils/responseUtils";

// ------------------------------
// 현재 profile 조회
// ------------------------------
export async function getProfileController(req: Request, res: Response) {
  const snapshot = getHistorySnapshot();
  if (!snapshot) {
    res.status(503).json({
      success: false,
      error: "NO_CACHE",
      message: "당첨 이력 캐시가 비어 있습니다.",
    } satisfies ApiResponse<null>);
    return;
  }

  res.json({
    success: true,
    data: {
      historySize: snapshot.history.size,
      latestDraw: snapshot.history.latest() ?? null,
      source: snapshot.source,
      builtAt: snapshot.builtAt.toISOString(),
      config: snapshot.config,
      profile: snapshot.profile,
    },
  });
}

// ------------------------------
// 이력 파일 재로딩 + profile 재생성
// ------------------------------
export async function rebuildProfileController(req: Request, res: Response) {
  try {
    const snapshot = await rebuildHistoryCache();
    res.json({
      success: true,
      message: `${snapshot.history.size}개 회차로 profile 재생성`,
    } satisfies ApiResponse<null>);
  } catch (err) {
    sendError(res, err, "Profile rebuild");
  }
}

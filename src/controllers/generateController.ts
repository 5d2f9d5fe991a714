// controllers/generateController.ts
import { Request, Response } from "express";
import { ApiResponse } from "../types/api";
import { getHistorySnapshot } from "../lib/historyCache";
import { recommendNumbers, RecommendResult } from "../lib/recommender";
import { GenerateParams, parseGenerateBody, parseGenerateQuery } from "../utils/requestUtils";
import { sendError } from "../utils/responseUtils";

function runGeneration(res: Response, params: GenerateParams) {
  const result = recommendNumbers(getHistorySnapshot(), {
    history: params.history,
    config: params.config,
    count: params.count,
    seed: params.seed,
    timeoutMs: params.timeoutMs,
  });

  const accepted = result.sets.filter((s) => s.status === "accepted").length;

  res.json({
    success: true,
    data: result,
    message: `${accepted}/${result.sets.length} 세트 생성`,
  } satisfies ApiResponse<RecommendResult>);
}

// GET /api/generate?count=3&seed=42&debug=true
export async function getGenerateController(req: Request, res: Response) {
  try {
    const { params, error } = parseGenerateQuery(req.query);
    if (!params) {
      res.status(400).json({
        success: false,
        error: "INVALID_PARAMS",
        message: error,
      } satisfies ApiResponse<null>);
      return;
    }

    if (!getHistorySnapshot()) {
      res.status(503).json({
        success: false,
        error: "NO_CACHE",
        message: "당첨 이력 캐시가 비어 있습니다.",
      } satisfies ApiResponse<null>);
      return;
    }

    runGeneration(res, params);
  } catch (err) {
    sendError(res, err, "Generate");
  }
}

// POST /api/generate  { history?, config?, count?, seed?, timeoutMs? }
export async function postGenerateController(req: Request, res: Response) {
  try {
    const { params, error } = parseGenerateBody(req.body);
    if (!params) {
      res.status(400).json({
        success: false,
        error: "INVALID_PARAMS",
        message: error,
      } satisfies ApiResponse<null>);
      return;
    }

    runGeneration(res, params);
  } catch (err) {
    sendError(res, err, "Generate");
  }
}

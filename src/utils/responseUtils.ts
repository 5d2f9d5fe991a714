import { Response } from "express";
import { ApiResponse } from "../types/api";
import {
  InvalidConfigurationError,
  InvalidHistoryError,
  isGeneratorError,
} from "../lib/errors";

/**
 * 생성기 에러는 400, 그 외는 500
 */
export function sendError(res: Response, err: unknown, context: string) {
  if (isGeneratorError(err)) {
    const issues =
      err instanceof InvalidConfigurationError || err instanceof InvalidHistoryError
        ? err.issues
        : undefined;
    res.status(400).json({
      success: false,
      error: err.code,
      message: err.message,
      issues,
    } satisfies ApiResponse<null>);
    return;
  }

  console.error(`${context} error:`, err);
  res.status(500).json({
    success: false,
    error: "SERVER_ERROR",
    message: err instanceof Error ? err.message : "internal error",
  } satisfies ApiResponse<null>);
}

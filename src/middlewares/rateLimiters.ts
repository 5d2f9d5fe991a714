import rateLimit from "express-rate-limit";

/**
 * 번호 생성 엔드포인트용 레이트 리미터
 * - IP 기준
 * - 1분에 30회 (생성 1회가 최대 maxAttempts 번 샘플링하므로 제한)
 */
export const generateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: Number(process.env.GENERATE_RATE_LIMIT) || 30,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: { success: false, message: "Too many requests. Please try again later." },
});

/**
 * profile 재생성은 파일 I/O 가 있으므로 더 엄격하게
 */
export const rebuildLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 3,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: { success: false, message: "Too many requests. Please try again later." },
});

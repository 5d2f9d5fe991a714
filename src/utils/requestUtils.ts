import { z } from "zod";
import { CHECK_NAMES, GeneratorConfig } from "../types/lotto";

const numbersSchema = z.array(z.number().int());

// 회차 객체 또는 번호 배열 둘 다 허용
export const historicalDrawSchema = z.union([
  numbersSchema,
  z.object({
    round: z.number().int().optional(),
    date: z.string().optional(),
    numbers: numbersSchema,
  }),
]);

export const historyFileSchema = z.union([
  z.array(historicalDrawSchema),
  z.object({ draws: z.array(historicalDrawSchema) }),
]);

export type HistoryFileInput = z.infer<typeof historyFileSchema>;

// 요청 1건이 이벤트 루프를 오래 붙잡지 않도록 상한
export const MAX_REQUEST_ATTEMPTS = 200_000;
export const MAX_REQUEST_TIMEOUT_MS = 10_000;

export const configOverridesSchema = z
  .object({
    drawSize: z.number().int(),
    minNumber: z.number().int(),
    maxNumber: z.number().int(),
    percentileLow: z.number(),
    percentileHigh: z.number(),
    gapPercentile: z.number(),
    multiplesPercentile: z.number(),
    clusterIntervals: z.array(z.tuple([z.number().int(), z.number().int()])),
    multiplesBases: z.array(z.number().int()),
    minHistoryForDerivedStats: z.number().int(),
    maxAttempts: z.number().int().min(1).max(MAX_REQUEST_ATTEMPTS),
    enabledChecks: z.array(z.enum(CHECK_NAMES)),
    patternProbabilityMinRatio: z.number(),
    maxConsecutiveRun: z.number().int(),
    debug: z.boolean(),
  })
  .partial()
  .strict();

const MAX_SETS = 10;

// query string 은 전부 문자열이므로 숫자 변환 후 검사
const queryNumber = (schema: z.ZodNumber) =>
  z.preprocess(
    (v: unknown) => (v === undefined || v === "" ? undefined : Number(v)),
    schema.optional()
  );

export const generateQuerySchema = z.object({
  count: queryNumber(z.number().int().min(1).max(MAX_SETS)),
  seed: queryNumber(z.number().int()),
  debug: z.enum(["true", "false"]).optional(),
});

export const generateBodySchema = z.object({
  history: z.array(historicalDrawSchema).optional(),
  config: configOverridesSchema.optional(),
  count: z.number().int().min(1).max(MAX_SETS).optional(),
  seed: z.number().int().optional(),
  timeoutMs: z.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).optional(),
});

export type GenerateBody = z.infer<typeof generateBodySchema>;

export interface GenerateParams {
  history?: GenerateBody["history"];
  config: Partial<GeneratorConfig>;
  count: number;
  seed?: number;
  timeoutMs?: number;
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * GET query → 생성 파라미터
 */
export function parseGenerateQuery(query: unknown): {
  params?: GenerateParams;
  error?: string;
} {
  const parsed = generateQuerySchema.safeParse(query);
  if (!parsed.success) return { error: formatZodError(parsed.error) };

  const { count, seed, debug } = parsed.data;
  return {
    params: {
      config: debug === undefined ? {} : { debug: debug === "true" },
      count: count ?? 1,
      seed,
    },
  };
}

/**
 * POST body → 생성 파라미터
 */
export function parseGenerateBody(body: unknown): {
  params?: GenerateParams;
  error?: string;
} {
  const parsed = generateBodySchema.safeParse(body ?? {});
  if (!parsed.success) return { error: formatZodError(parsed.error) };

  const { history, config, count, seed, timeoutMs } = parsed.data;
  return {
    params: {
      history,
      config: config ?? {},
      count: count ?? 1,
      seed,
      timeoutMs,
    },
  };
}

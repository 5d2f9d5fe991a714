// 생성기 공용 에러 타입

export type GeneratorErrorCode =
  | "INVALID_CONFIGURATION"
  | "INVALID_RANGE"
  | "INVALID_HISTORY";

export class GeneratorError extends Error {
  constructor(public readonly code: GeneratorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 설정값 검증 실패 (샘플링 시작 전에만 발생)
 */
export class InvalidConfigurationError extends GeneratorError {
  constructor(public readonly issues: string[]) {
    super("INVALID_CONFIGURATION", `잘못된 생성기 설정: ${issues.join("; ")}`);
  }
}

export class InvalidRangeError extends GeneratorError {
  constructor(min: number, max: number, count: number) {
    super(
      "INVALID_RANGE",
      `${min}~${max} 범위에서 서로 다른 번호 ${count}개를 뽑을 수 없습니다.`
    );
  }
}

export class InvalidHistoryError extends GeneratorError {
  constructor(public readonly issues: string[]) {
    super("INVALID_HISTORY", `잘못된 당첨 이력: ${issues.join("; ")}`);
  }
}

export function isGeneratorError(err: unknown): err is GeneratorError {
  return err instanceof GeneratorError;
}

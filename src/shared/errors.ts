/**
 * 폴링 엔진 에러 분류
 */
export type FailureKind = "not_found" | "auth" | "rate_limited" | "transient" | "storage";

export type RateLimitScope = "repository" | "account";

export abstract class MonitorError extends Error {
    abstract readonly kind: FailureKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** 레포지토리가 없거나 현재 자격 증명으로 접근 불가 */
export class NotFoundError extends MonitorError {
    readonly kind = "not_found" as const;

    constructor(readonly repositoryId: string, detail?: string) {
        super(detail ? `Repository ${repositoryId} not found: ${detail}` : `Repository ${repositoryId} not found`);
    }
}

/** 자격 증명 거부 — 프로세스 전체에 치명적 */
export class AuthError extends MonitorError {
    readonly kind = "auth" as const;
}

export class RateLimitError extends MonitorError {
    readonly kind = "rate_limited" as const;

    constructor(
        message: string,
        /** 재시도까지 대기 시간 (ms) */
        readonly retryAfterMs: number,
        readonly scope: RateLimitScope,
    ) {
        super(message);
    }
}

export class TransientNetworkError extends MonitorError {
    readonly kind = "transient" as const;
}

export class StorageError extends MonitorError {
    readonly kind = "storage" as const;
}

/** `owner/name` 형식이 아닌 입력 */
export class InvalidRepositoryError extends Error {
    constructor(readonly input: string) {
        super(`Invalid repository "${input}". Expected format: owner/repository-name`);
        this.name = "InvalidRepositoryError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * 알 수 없는 에러는 일시적 장애로 간주
 */
export function classifyFailure(error: unknown): MonitorError {
    if (error instanceof MonitorError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransientNetworkError(message, { cause: error });
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

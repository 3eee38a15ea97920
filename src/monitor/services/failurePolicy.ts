import type { FailureKind, MonitorError } from "../../shared/errors.js";
import { RateLimitError } from "../../shared/errors.js";
import type { ReachabilityState } from "../../shared/models/Repository.js";

export interface FailurePolicyOptions {
    /** 연속 NotFound 횟수가 이 값에 도달하면 unreachable */
    unreachableThreshold: number;
    /** 일시적 장애 첫 backoff (ms) */
    baseBackoffMs: number;
    /** backoff 상한 (ms) */
    maxBackoffMs: number;
    /** 연속 일시적 장애가 이 횟수에 도달하면 관리자에게 알림 */
    transientAlertThreshold: number;
    /** 연속 저장소 장애가 이 횟수에 도달하면 관리자에게 알림 */
    storageAlertThreshold: number;
}

export const DEFAULT_FAILURE_POLICY: FailurePolicyOptions = {
    unreachableThreshold: 3,
    baseBackoffMs: 60_000,
    maxBackoffMs: 60 * 60_000,
    transientAlertThreshold: 10,
    storageAlertThreshold: 5,
};

export interface FailureDecision {
    kind: FailureKind;
    /** 이 시각(epoch ms) 전에는 다시 확인하지 않음, null이면 다음 tick */
    retryAt: number | null;
    /** account 전체 중지 여부 */
    accountWide: boolean;
    /** unreachable 상태로 전환 */
    markUnreachable: boolean;
    /** 구독자에게 unreachable 알림 (전환 시 1회) */
    notifySubscribers: boolean;
    /** 관리자 진단 알림 */
    alertAdmins: boolean;
    /** 프로세스 전체 중단 */
    fatal: boolean;
}

/**
 * 레포지토리별 실패 분류 및 backoff 정책
 */
export class FailurePolicy {
    readonly options: FailurePolicyOptions;

    constructor(options: Partial<FailurePolicyOptions> = {}) {
        this.options = { ...DEFAULT_FAILURE_POLICY, ...options };
    }

    backoffFor(consecutiveFailures: number): number {
        const exponent = Math.max(0, consecutiveFailures - 1);
        return Math.min(this.options.baseBackoffMs * 2 ** exponent, this.options.maxBackoffMs);
    }

    /**
     * @param consecutiveFailures 이번 실패를 포함한 연속 실패 횟수
     * @param previousState 실패 전 도달 가능 상태
     */
    decide(error: MonitorError, consecutiveFailures: number, previousState: ReachabilityState, now: number): FailureDecision {
        const decision: FailureDecision = {
            kind: error.kind,
            retryAt: null,
            accountWide: false,
            markUnreachable: false,
            notifySubscribers: false,
            alertAdmins: false,
            fatal: false,
        };

        switch (error.kind) {
            case "not_found": {
                const reached = consecutiveFailures >= this.options.unreachableThreshold;
                decision.markUnreachable = reached;
                decision.notifySubscribers = reached && previousState === "active";
                break;
            }
            case "rate_limited": {
                if (error instanceof RateLimitError) {
                    decision.retryAt = now + error.retryAfterMs;
                    decision.accountWide = error.scope === "account";
                } else {
                    decision.retryAt = now + this.backoffFor(consecutiveFailures);
                }
                break;
            }
            case "transient":
                decision.retryAt = now + this.backoffFor(consecutiveFailures);
                decision.alertAdmins = consecutiveFailures === this.options.transientAlertThreshold;
                break;
            case "storage":
                decision.alertAdmins = consecutiveFailures === this.options.storageAlertThreshold;
                break;
            case "auth":
                decision.fatal = true;
                decision.alertAdmins = true;
                break;
        }

        return decision;
    }
}

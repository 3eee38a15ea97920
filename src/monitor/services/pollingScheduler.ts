import { errorMessage, type FailureKind } from "../../shared/errors.js";
import type { CheckResult } from "../../shared/models/CheckResult.js";
import type { RepositoryId } from "../../shared/models/Repository.js";
import type { SubscriptionIndex } from "../storage/types.js";
import { KeyedLock } from "./keyedLock.js";
import type { CheckTrigger, RepositoryChecker } from "./repositoryChecker.js";

function failure(detail: string): CheckResult {
    return { status: "failure", kind: "transient", detail, retryAt: null, accountWide: false, fatal: false };
}

export type RepositoryPhase = "idle" | "checking" | "backoff";

export interface PollingSchedulerOptions {
    intervalMs: number;
    /**
     * 한 cycle이 이 시간을 넘기면 호출자에게 실패로 보고
     * 잠금은 cycle이 실제로 끝날 때까지 유지됩니다.
     */
    cycleTimeoutMs: number;
    clock?: () => number;
    /** 자격 증명 거부 등 치명적 실패 시 호출 */
    onFatal?: (detail: string) => void;
}

interface RepositoryRuntime {
    backoffUntil: number | null;
    backoffReason: FailureKind | null;
}

export interface TickSummary {
    started: RepositoryId[];
    skipped: RepositoryId[];
    /** 이번 tick에서 시작한 cycle이 모두 끝나면 resolve */
    settled: Promise<CheckResult[]>;
}

/**
 * 주기적 폴링 스케줄러
 *
 * 레포지토리별 상태: idle → checking → idle | backoff, backoff → idle (대기 시간 경과 후)
 * 각 레포지토리의 cycle은 독립적으로 실행되며, 느린 레포지토리가 다른 레포지토리를 지연시키지 않습니다.
 */
export class PollingScheduler {
    private subscriptions: SubscriptionIndex;
    private checker: RepositoryChecker;
    private options: PollingSchedulerOptions;
    private clock: () => number;

    private locks = new KeyedLock<CheckResult>();
    private runtimes = new Map<RepositoryId, RepositoryRuntime>();
    private timer: ReturnType<typeof setInterval> | null = null;
    /** 레포지토리 목록을 조회 중인 tick */
    private activeTicks = new Set<Promise<TickSummary>>();
    private stopped = false;
    private halted = false;
    private accountPausedUntil: number | null = null;

    constructor(subscriptions: SubscriptionIndex, checker: RepositoryChecker, options: PollingSchedulerOptions) {
        this.subscriptions = subscriptions;
        this.checker = checker;
        this.options = options;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * 폴링 시작: 즉시 한 번 실행 후 interval마다 반복
     */
    start(): void {
        if (this.timer) return;
        this.stopped = false;

        this.runTick();
        this.timer = setInterval(() => this.runTick(), this.options.intervalMs);
        console.log(`✅ Monitoring started with interval ${this.options.intervalMs / 1000} seconds`);
    }

    /**
     * 새 cycle 시작을 막고 진행 중인 cycle이 끝날 때까지 대기
     */
    async stop(): Promise<void> {
        this.stopped = true;
        this.clearTimer();

        await Promise.allSettled([...this.activeTicks]);
        const pending = this.locks.pending();
        if (pending.length > 0) {
            console.log(`⏳ Waiting for ${pending.length} in-flight checks...`);
        }
        await Promise.allSettled(pending);
        console.log("🛑 Monitoring stopped");
    }

    isHalted(): boolean {
        return this.halted;
    }

    phaseOf(repositoryId: RepositoryId): RepositoryPhase {
        if (this.locks.isHeld(repositoryId)) {
            return "checking";
        }
        const runtime = this.runtimes.get(repositoryId);
        if (runtime?.backoffUntil && this.clock() < runtime.backoffUntil) {
            return "backoff";
        }
        return "idle";
    }

    private runTick(): void {
        this.tick().catch(error => {
            console.error(`❌ Monitoring tick error: ${errorMessage(error)}`);
        });
    }

    /**
     * 구독자가 있는 모든 레포지토리 중 idle 상태인 것의 cycle 시작
     */
    tick(): Promise<TickSummary> {
        const run = this.startCycles();
        this.activeTicks.add(run);
        return run.finally(() => {
            this.activeTicks.delete(run);
        });
    }

    private async startCycles(): Promise<TickSummary> {
        const summary: TickSummary = { started: [], skipped: [], settled: Promise.resolve([]) };
        if (this.stopped || this.halted) {
            return summary;
        }

        let repositories: RepositoryId[];
        try {
            repositories = await this.subscriptions.allActiveRepositories();
        } catch (error) {
            console.error(`❌ Failed to list monitored repositories: ${errorMessage(error)}`);
            return summary;
        }

        // 조회하는 동안 stop() 또는 halt가 호출되었을 수 있음
        if (this.stopped || this.halted) {
            return summary;
        }

        const now = this.clock();
        if (this.accountPausedUntil && now < this.accountPausedUntil) {
            console.warn(`⏸️  Rate limited, checks paused until ${new Date(this.accountPausedUntil).toISOString()}`);
            summary.skipped = repositories;
            return summary;
        }

        console.log(`\n📡 Checking ${repositories.length} repositories...`);

        const cycles: Promise<CheckResult>[] = [];
        for (const repositoryId of repositories) {
            if (this.phaseOf(repositoryId) !== "idle") {
                summary.skipped.push(repositoryId);
                continue;
            }

            summary.started.push(repositoryId);
            cycles.push(this.run(repositoryId, "scheduled"));
        }

        summary.settled = Promise.all(cycles);
        return summary;
    }

    /**
     * 수동 확인: interval과 무관하게 즉시 실행
     * 이미 확인 중이면 진행 중인 cycle의 결과를 공유합니다.
     */
    async checkNow(repositoryId: RepositoryId): Promise<CheckResult> {
        if (this.stopped) {
            return { status: "skipped", reason: "stopped", until: null };
        }
        if (this.halted) {
            return { status: "skipped", reason: "halted", until: null };
        }

        const now = this.clock();
        if (this.accountPausedUntil && now < this.accountPausedUntil) {
            return { status: "skipped", reason: "rate_limited", until: this.accountPausedUntil };
        }
        const runtime = this.runtimes.get(repositoryId);
        if (runtime?.backoffReason === "rate_limited" && runtime.backoffUntil && now < runtime.backoffUntil) {
            return { status: "skipped", reason: "rate_limited", until: runtime.backoffUntil };
        }

        return this.run(repositoryId, "manual");
    }

    /**
     * 잠금을 얻어 cycle 실행, 이미 실행 중이면 그 cycle에 합류
     * 시간 초과는 호출자에게만 보고하며 잠금은 cycle이 끝날 때 해제됩니다.
     */
    private run(repositoryId: RepositoryId, trigger: CheckTrigger): Promise<CheckResult> {
        const outcome = this.locks.tryRun(repositoryId, () => this.execute(repositoryId, trigger));
        if (!outcome.acquired) {
            console.log(`   ${repositoryId} is already being checked, joining the running check`);
        }
        return this.withTimeout(repositoryId, outcome.promise);
    }

    private runtimeFor(repositoryId: RepositoryId): RepositoryRuntime {
        let runtime = this.runtimes.get(repositoryId);
        if (!runtime) {
            runtime = { backoffUntil: null, backoffReason: null };
            this.runtimes.set(repositoryId, runtime);
        }
        return runtime;
    }

    private async execute(repositoryId: RepositoryId, trigger: CheckTrigger): Promise<CheckResult> {
        const result = await this.checker.check(repositoryId, trigger).catch((error: unknown): CheckResult => {
            console.error(`❌ Unexpected error while checking ${repositoryId}: ${errorMessage(error)}`);
            return failure(`Unexpected error: ${errorMessage(error)}`);
        });
        const runtime = this.runtimeFor(repositoryId);

        if (result.status !== "failure") {
            runtime.backoffUntil = null;
            runtime.backoffReason = null;
            return result;
        }

        runtime.backoffUntil = result.retryAt;
        runtime.backoffReason = result.retryAt ? result.kind : null;

        if (result.accountWide && result.retryAt) {
            this.accountPausedUntil = Math.max(this.accountPausedUntil ?? 0, result.retryAt);
        }
        if (result.fatal) {
            this.halt(result.detail);
        }
        return result;
    }

    private withTimeout(repositoryId: RepositoryId, task: Promise<CheckResult>): Promise<CheckResult> {
        const timeoutMs = this.options.cycleTimeoutMs;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const timeout = new Promise<CheckResult>(resolve => {
            timer = setTimeout(() => {
                console.warn(`⚠️  Check of ${repositoryId} exceeded ${timeoutMs}ms, keeping it locked until it finishes`);
                resolve(failure(`Check cycle timed out after ${timeoutMs}ms`));
            }, timeoutMs);
        });

        return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
    }

    private halt(detail: string): void {
        if (this.halted) return;
        this.halted = true;
        this.clearTimer();
        console.error(`🛑 Monitoring halted: ${detail}`);
        this.options.onFatal?.(detail);
    }

    private clearTimer(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }
}

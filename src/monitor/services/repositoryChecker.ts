import {
    TransientNetworkError,
    classifyFailure,
    errorMessage,
    type FailureKind,
    type MonitorError,
} from "../../shared/errors.js";
import type { CheckResult } from "../../shared/models/CheckResult.js";
import type { BranchListing, CommitListing } from "../../shared/models/Commit.js";
import type { Cursor, RepositoryId, RepositoryState } from "../../shared/models/Repository.js";
import type { RepositoryClient } from "../github/repositoryClient.js";
import type { CursorStore, SubscriptionIndex } from "../storage/types.js";
import { detectChanges } from "./changeDetector.js";
import type { FailurePolicy } from "./failurePolicy.js";
import type { NotificationDispatcher } from "./notificationDispatcher.js";
import type { RuntimeStats } from "./runtimeStats.js";

export type CheckTrigger = "scheduled" | "manual";

export interface RepositoryCheckerDeps {
    store: CursorStore;
    subscriptions: SubscriptionIndex;
    client: RepositoryClient;
    dispatcher: NotificationDispatcher;
    policy: FailurePolicy;
    stats: RuntimeStats;
    clock?: () => number;
}

/**
 * 단일 레포지토리 check cycle
 * branch 조회 → 커밋 조회 → 변경 감지 → cursor compareAndSet → 알림
 *
 * 동시 실행 방지는 호출자(PollingScheduler)의 책임이며,
 * compareAndSet은 그 위의 추가 보호 장치입니다.
 */
export class RepositoryChecker {
    private store: CursorStore;
    private subscriptions: SubscriptionIndex;
    private client: RepositoryClient;
    private dispatcher: NotificationDispatcher;
    private policy: FailurePolicy;
    private stats: RuntimeStats;
    private clock: () => number;

    /** 저장소 장애는 저장소에 기록할 수 없으므로 메모리에서 센다 */
    private storageFailures = new Map<RepositoryId, number>();
    private lastFailureKind = new Map<RepositoryId, FailureKind>();

    constructor(deps: RepositoryCheckerDeps) {
        this.store = deps.store;
        this.subscriptions = deps.subscriptions;
        this.client = deps.client;
        this.dispatcher = deps.dispatcher;
        this.policy = deps.policy;
        this.stats = deps.stats;
        this.clock = deps.clock ?? Date.now;
    }

    async check(repositoryId: RepositoryId, trigger: CheckTrigger): Promise<CheckResult> {
        let state: RepositoryState | null = null;

        try {
            state = await this.store.get(repositoryId);

            if (trigger === "scheduled" && state?.state === "unreachable") {
                return { status: "skipped", reason: "unreachable", until: null };
            }

            console.log(`🔍 Checking ${repositoryId} (${trigger})...`);
            const result = await this.runCycle(repositoryId, state);

            this.storageFailures.delete(repositoryId);
            this.lastFailureKind.delete(repositoryId);
            this.stats.recordCheck(false);
            return result;
        } catch (error) {
            this.stats.recordCheck(true);
            return this.handleFailure(repositoryId, state, classifyFailure(error));
        }
    }

    private async runCycle(repositoryId: RepositoryId, state: RepositoryState | null): Promise<CheckResult> {
        let branch = state?.defaultBranch ?? null;
        if (!branch) {
            branch = await this.client.resolveDefaultBranch(repositoryId);
            console.log(`   Default branch: ${branch}`);
            await this.store.updateMetadata(repositoryId, { defaultBranch: branch });
        }

        const stored = state?.cursor ?? null;
        const baselineEstablished = state?.baselineEstablished ?? false;
        const listing = await this.listOnCurrentBranch(repositoryId, branch, stored, baselineEstablished);
        const detection = detectChanges(stored, listing, baselineEstablished);

        if (detection.kind === "baseline") {
            if (detection.newCursor) {
                const set = await this.store.compareAndSet(repositoryId, null, detection.newCursor);
                console.log(set
                    ? `   Baseline: ${detection.newCursor.commitId.substring(0, 7)} (no notification)`
                    : `   Baseline already set by another check`);
            } else {
                // 이후 push되는 커밋은 모두 baseline 이후이므로 알림 대상
                await this.store.updateMetadata(repositoryId, { baselineEstablished: true });
                console.log(`   Baseline: (empty repository)`);
            }
            await this.markHealthy(repositoryId);
            return { status: "no_change", baseline: true };
        }

        if (detection.kind === "no_change") {
            console.log(`   ⏭️  Up to date: ${stored?.commitId.substring(0, 7) ?? "(none)"}`);
            await this.markHealthy(repositoryId);
            return { status: "no_change", baseline: false };
        }

        // 구독자 목록을 먼저 읽어서 cursor 전진 후 조회 실패로 알림이 사라지지 않게 함
        const subscribers = await this.subscriptions.subscribersOf(repositoryId);
        const advanced = await this.store.compareAndSet(repositoryId, stored?.commitId ?? null, detection.newCursor);

        if (!advanced) {
            console.warn(`⚠️  Cursor for ${repositoryId} changed during the check, skipping notifications`);
            await this.markHealthy(repositoryId);
            return { status: "no_change", baseline: false };
        }

        if (detection.kind === "new_commits") {
            console.log(
                `   ✅ ${detection.commits.length} new commits: ` +
                `${stored?.commitId.substring(0, 7) ?? "(empty)"} → ${detection.newCursor.commitId.substring(0, 7)}`
            );
            this.stats.recordCommits(detection.commits.length);
            await this.dispatcher.dispatchCommits(repositoryId, subscribers, detection.commits);
            await this.markHealthy(repositoryId);
            return { status: "new_commits", commits: detection.commits, cursor: detection.newCursor };
        }

        console.warn(`⚠️  History of ${repositoryId} was rewritten, new tip ${detection.tip.id.substring(0, 7)}`);
        await this.dispatcher.dispatchHistoryRewritten(repositoryId, subscribers, detection.tip);
        await this.markHealthy(repositoryId);
        return { status: "history_rewritten", tip: detection.tip, cursor: detection.newCursor };
    }

    /**
     * 커밋 조회, 기본 브랜치가 바뀌었으면 저장된 브랜치를 갱신하고 한 번 다시 조회
     */
    private async listOnCurrentBranch(
        repositoryId: RepositoryId,
        branch: string,
        stored: Cursor | null,
        baselineEstablished: boolean
    ): Promise<BranchListing> {
        const list = (target: string): Promise<CommitListing> => !stored && baselineEstablished
            ? this.client.listCommitsFromStart(repositoryId, target)
            : this.client.listCommitsSince(repositoryId, target, stored);

        const listing = await list(branch);
        if (listing.kind !== "branch_changed") {
            return listing;
        }

        console.log(`   🔀 Default branch changed: ${branch} → ${listing.branch}`);
        await this.store.updateMetadata(repositoryId, { defaultBranch: listing.branch });

        const retried = await list(listing.branch);
        if (retried.kind === "branch_changed") {
            throw new TransientNetworkError(`Default branch of ${repositoryId} changed again during the check`);
        }
        return retried;
    }

    /**
     * 성공 시 실패 횟수 초기화
     * cursor와 알림은 이미 처리되었으므로 여기서의 저장 실패는 결과를 바꾸지 않습니다.
     */
    private async markHealthy(repositoryId: RepositoryId): Promise<void> {
        try {
            await this.store.updateMetadata(repositoryId, {
                state: "active",
                consecutiveFailures: 0,
                lastCheckedAt: new Date(this.clock()).toISOString(),
            });
        } catch (error) {
            console.error(`❌ Failed to record check time for ${repositoryId}: ${errorMessage(error)}`);
        }
    }

    private countFailure(repositoryId: RepositoryId, state: RepositoryState | null, failure: MonitorError): number {
        if (failure.kind === "storage") {
            const count = (this.storageFailures.get(repositoryId) ?? 0) + 1;
            this.storageFailures.set(repositoryId, count);
            return count;
        }

        // 종류가 바뀌면 연속 횟수를 새로 센다
        const lastKind = this.lastFailureKind.get(repositoryId);
        this.lastFailureKind.set(repositoryId, failure.kind);
        if (lastKind !== undefined && lastKind !== failure.kind) {
            return 1;
        }
        return (state?.consecutiveFailures ?? 0) + 1;
    }

    private async handleFailure(repositoryId: RepositoryId, state: RepositoryState | null, failure: MonitorError): Promise<CheckResult> {
        const now = this.clock();
        const previousState = state?.state ?? "active";
        const failures = this.countFailure(repositoryId, state, failure);
        const decision = this.policy.decide(failure, failures, previousState, now);

        if (failure.kind === "storage" || failure.kind === "auth") {
            console.error(`❌ Check failed for ${repositoryId} (${failure.kind}, #${failures}): ${failure.message}`);
        } else {
            console.warn(`⚠️  Check failed for ${repositoryId} (${failure.kind}, #${failures}): ${failure.message}`);
        }

        if (failure.kind === "not_found" || failure.kind === "transient") {
            try {
                await this.store.updateMetadata(repositoryId, {
                    consecutiveFailures: failures,
                    lastCheckedAt: new Date(now).toISOString(),
                    ...(decision.markUnreachable ? { state: "unreachable" as const } : {}),
                });
            } catch (error) {
                console.error(`❌ Failed to record failure for ${repositoryId}: ${errorMessage(error)}`);
            }
        }

        if (decision.markUnreachable && decision.notifySubscribers) {
            console.error(`🛑 ${repositoryId} marked unreachable after ${failures} attempts`);
            await this.notifyUnreachable(repositoryId, failure.message);
        }

        if (decision.alertAdmins) {
            const message = decision.fatal
                ? `GitHub credentials were rejected, polling halted: ${failure.message}`
                : `${repositoryId} has failed ${failures} consecutive checks (${failure.kind}): ${failure.message}`;
            await this.dispatcher.alertAdmins(decision.fatal ? "critical" : "warning", message, decision.fatal ? undefined : repositoryId);
        }

        return {
            status: "failure",
            kind: failure.kind,
            detail: failure.message,
            retryAt: decision.retryAt,
            accountWide: decision.accountWide,
            fatal: decision.fatal,
        };
    }

    private async notifyUnreachable(repositoryId: RepositoryId, reason: string): Promise<void> {
        try {
            const subscribers = await this.subscriptions.subscribersOf(repositoryId);
            await this.dispatcher.dispatchUnreachable(repositoryId, subscribers, reason);
        } catch (error) {
            console.error(`❌ Failed to notify subscribers of ${repositoryId}: ${errorMessage(error)}`);
        }
    }
}

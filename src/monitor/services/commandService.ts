import type { CheckResult } from "../../shared/models/CheckResult.js";
import {
    parseRepositoryId,
    repositoryUrl,
    type ReachabilityState,
    type RepositoryId,
} from "../../shared/models/Repository.js";
import type { RepositoryClient } from "../github/repositoryClient.js";
import type { CursorStore, SubscriptionIndex } from "../storage/types.js";
import type { PollingScheduler } from "./pollingScheduler.js";
import type { RuntimeStats, StatsSnapshot } from "./runtimeStats.js";

export interface AddResult {
    repository: RepositoryId;
    repositoryUrl: string;
    defaultBranch: string | null;
    /** 새 구독 생성 여부 (false면 이미 구독 중) */
    created: boolean;
    /** baseline check 결과 (이미 cursor가 있으면 null) */
    baseline: CheckResult | null;
}

export interface RepositorySummary {
    repository: RepositoryId;
    repositoryUrl: string;
    defaultBranch: string | null;
    state: ReachabilityState;
    lastCommitId: string | null;
    lastCheckedAt: string | null;
}

export interface StatsReport extends StatsSnapshot {
    subscribedRepositories: number;
    trackedRepositories: number;
    checkIntervalSeconds: number;
    recentRepositories: RepositoryId[];
}

export interface CommandServiceDeps {
    store: CursorStore;
    subscriptions: SubscriptionIndex;
    client: RepositoryClient;
    scheduler: PollingScheduler;
    stats: RuntimeStats;
    checkIntervalSeconds: number;
}

/**
 * 채팅 명령 처리 (/add, /remove, /list, /check, /stats)
 */
export class CommandService {
    constructor(private readonly deps: CommandServiceDeps) {}

    /**
     * 구독 추가
     * 처음 보는 레포지토리나 unreachable 상태면 기본 브랜치를 확인하고, 알림 없이 baseline을 기록합니다.
     */
    async add(subscriberId: string, input: string): Promise<AddResult> {
        const { id } = parseRepositoryId(input);
        const { store, subscriptions, client, scheduler } = this.deps;

        const created = await subscriptions.subscribe(subscriberId, id);
        let state = await store.get(id);

        if (!created && state?.baselineEstablished && state.state === "active") {
            return {
                repository: id,
                repositoryUrl: repositoryUrl(id),
                defaultBranch: state.defaultBranch,
                created,
                baseline: null,
            };
        }

        if (!state?.defaultBranch || state.state === "unreachable") {
            let defaultBranch: string;
            try {
                defaultBranch = await client.resolveDefaultBranch(id);
            } catch (error) {
                if (created) {
                    await subscriptions.unsubscribe(subscriberId, id);
                }
                throw error;
            }

            await store.updateMetadata(id, { defaultBranch, state: "active", consecutiveFailures: 0 });
            console.log(`➕ ${subscriberId} subscribed to ${id} (branch: ${defaultBranch})`);
            state = await store.get(id);
        }

        const baseline = state?.baselineEstablished ? null : await scheduler.checkNow(id);

        return {
            repository: id,
            repositoryUrl: repositoryUrl(id),
            defaultBranch: state?.defaultBranch ?? null,
            created,
            baseline,
        };
    }

    async remove(subscriberId: string, input: string): Promise<{ repository: RepositoryId; removed: boolean }> {
        const { id } = parseRepositoryId(input);
        const removed = await this.deps.subscriptions.unsubscribe(subscriberId, id);
        if (removed) {
            console.log(`➖ ${subscriberId} unsubscribed from ${id}`);
        }
        return { repository: id, removed };
    }

    async list(subscriberId: string): Promise<RepositorySummary[]> {
        const repositories = await this.deps.subscriptions.repositoriesOf(subscriberId);

        return Promise.all(repositories.map(async id => {
            const state = await this.deps.store.get(id);
            return {
                repository: id,
                repositoryUrl: repositoryUrl(id),
                defaultBranch: state?.defaultBranch ?? null,
                state: state?.state ?? "active",
                lastCommitId: state?.cursor?.commitId ?? null,
                lastCheckedAt: state?.lastCheckedAt ?? null,
            };
        }));
    }

    /**
     * 구독 중인 모든 레포지토리 수동 확인
     */
    async check(subscriberId: string): Promise<Array<{ repository: RepositoryId; result: CheckResult }>> {
        const repositories = await this.deps.subscriptions.repositoriesOf(subscriberId);
        console.log(`🔍 Manual check of ${repositories.length} repositories for ${subscriberId}`);

        return Promise.all(repositories.map(async id => ({
            repository: id,
            result: await this.deps.scheduler.checkNow(id),
        })));
    }

    async stats(subscriberId: string): Promise<StatsReport> {
        const [own, tracked] = await Promise.all([
            this.deps.subscriptions.repositoriesOf(subscriberId),
            this.deps.subscriptions.allActiveRepositories(),
        ]);

        return {
            ...this.deps.stats.snapshot(),
            subscribedRepositories: own.length,
            trackedRepositories: tracked.length,
            checkIntervalSeconds: this.deps.checkIntervalSeconds,
            recentRepositories: own.slice(0, 5),
        };
    }
}

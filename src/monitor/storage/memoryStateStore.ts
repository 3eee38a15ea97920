import {
    createRepositoryState,
    type Cursor,
    type RepositoryId,
    type RepositoryMetadataPatch,
    type RepositoryState,
} from "../../shared/models/Repository.js";
import type { StateStore } from "./types.js";

export interface SubscriptionRecord {
    subscriberId: string;
    repositoryId: RepositoryId;
    createdAt: string;
}

/**
 * 저장 파일 구조 (subscriptions / repository_cursors 테이블과 동일한 형태)
 */
export interface StateSnapshot {
    subscriptions: SubscriptionRecord[];
    repositories: Record<RepositoryId, RepositoryState>;
    /** Last updated timestamp */
    lastUpdated: string;
}

export function emptySnapshot(): StateSnapshot {
    return {
        subscriptions: [],
        repositories: {},
        lastUpdated: new Date().toISOString(),
    };
}

/**
 * 프로세스 메모리 기반 상태 저장소
 * 모든 변경은 동기적으로 처리되므로 compareAndSet이 원자적입니다.
 */
export class MemoryStateStore implements StateStore {
    protected state: StateSnapshot;

    constructor(initial: StateSnapshot = emptySnapshot()) {
        this.state = initial;
    }

    /**
     * 새 상태를 저장하는 hook (파일 저장소에서 override)
     * 실패하면 메모리 상태도 바뀌지 않습니다.
     */
    protected persist(_next: StateSnapshot): void {}

    private commit(mutate: (draft: StateSnapshot) => void): void {
        const draft = structuredClone(this.state);
        mutate(draft);
        draft.lastUpdated = new Date().toISOString();
        this.persist(draft);
        this.state = draft;
    }

    async get(repositoryId: RepositoryId): Promise<RepositoryState | null> {
        const existing = this.state.repositories[repositoryId];
        return existing ? structuredClone(existing) : null;
    }

    async compareAndSet(repositoryId: RepositoryId, expectedCommitId: string | null, newCursor: Cursor): Promise<boolean> {
        const existing = this.state.repositories[repositoryId];
        const currentCommitId = existing?.cursor?.commitId ?? null;

        if (currentCommitId !== expectedCommitId) {
            return false;
        }

        this.commit(draft => {
            const next = draft.repositories[repositoryId] ?? createRepositoryState(repositoryId);
            draft.repositories[repositoryId] = { ...next, cursor: { ...newCursor }, baselineEstablished: true };
        });
        return true;
    }

    async updateMetadata(repositoryId: RepositoryId, patch: RepositoryMetadataPatch): Promise<void> {
        this.commit(draft => {
            const existing = draft.repositories[repositoryId] ?? createRepositoryState(repositoryId);
            draft.repositories[repositoryId] = { ...existing, ...patch };
        });
    }

    async subscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean> {
        const exists = this.state.subscriptions.some(
            s => s.subscriberId === subscriberId && s.repositoryId === repositoryId
        );
        if (exists) {
            return false;
        }

        this.commit(draft => {
            draft.subscriptions.push({ subscriberId, repositoryId, createdAt: new Date().toISOString() });
        });
        return true;
    }

    async unsubscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean> {
        const matches = (s: SubscriptionRecord) =>
            s.subscriberId === subscriberId && s.repositoryId === repositoryId;

        if (!this.state.subscriptions.some(matches)) {
            return false;
        }

        this.commit(draft => {
            draft.subscriptions = draft.subscriptions.filter(s => !matches(s));
        });
        return true;
    }

    async subscribersOf(repositoryId: RepositoryId): Promise<string[]> {
        return this.state.subscriptions
            .filter(s => s.repositoryId === repositoryId)
            .map(s => s.subscriberId);
    }

    async repositoriesOf(subscriberId: string): Promise<RepositoryId[]> {
        return this.state.subscriptions
            .filter(s => s.subscriberId === subscriberId)
            .map(s => s.repositoryId)
            .sort();
    }

    async allActiveRepositories(): Promise<RepositoryId[]> {
        return [...new Set(this.state.subscriptions.map(s => s.repositoryId))];
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }
}

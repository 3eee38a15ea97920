import type {
    Cursor,
    RepositoryId,
    RepositoryMetadataPatch,
    RepositoryState,
} from "../../shared/models/Repository.js";

/**
 * 레포지토리별 cursor 및 메타데이터 저장소
 * 모든 메서드는 I/O 실패 시 StorageError를 던집니다.
 */
export interface CursorStore {
    get(repositoryId: RepositoryId): Promise<RepositoryState | null>;

    /**
     * 저장된 cursor의 commitId가 expectedCommitId와 같을 때만 newCursor로 교체
     * cursor를 바꾸는 유일한 경로입니다.
     */
    compareAndSet(repositoryId: RepositoryId, expectedCommitId: string | null, newCursor: Cursor): Promise<boolean>;

    /** cursor 이외의 필드 갱신 (레코드가 없으면 생성) */
    updateMetadata(repositoryId: RepositoryId, patch: RepositoryMetadataPatch): Promise<void>;
}

/**
 * 구독 관계 (subscriber <-> repository)
 */
export interface SubscriptionIndex {
    /** @returns 새 구독이 생성되었는지 여부 */
    subscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean>;
    /** @returns 구독이 존재해서 삭제되었는지 여부 */
    unsubscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean>;
    subscribersOf(repositoryId: RepositoryId): Promise<string[]>;
    repositoriesOf(subscriberId: string): Promise<RepositoryId[]>;
    /** 구독자가 한 명 이상인 레포지토리 */
    allActiveRepositories(): Promise<RepositoryId[]>;
}

export interface StateStore extends CursorStore, SubscriptionIndex {
    /** 저장소 연결 확인 (health check) */
    healthCheck(): Promise<boolean>;
}

import type { CommitListing } from "../../shared/models/Commit.js";
import type { Cursor, RepositoryId } from "../../shared/models/Repository.js";

/**
 * 소스 호스팅 API 어댑터
 * 실패 시 NotFoundError / RateLimitError / TransientNetworkError / AuthError를 던집니다.
 */
export interface RepositoryClient {
    resolveDefaultBranch(repositoryId: RepositoryId): Promise<string>;

    /**
     * cursor가 없으면 tip 하나만, 있으면 cursor 이후의 모든 커밋을 newest-first로 반환
     * 새 커밋이 없으면 빈 목록을 반환합니다.
     * branch가 더 이상 기본 브랜치가 아니면 branch_changed를 반환합니다.
     */
    listCommitsSince(repositoryId: RepositoryId, branch: string, cursor: Cursor | null): Promise<CommitListing>;

    /**
     * 브랜치의 전체 커밋을 newest-first로 반환 (빈 레포지토리로 baseline을 잡은 경우)
     */
    listCommitsFromStart(repositoryId: RepositoryId, branch: string): Promise<CommitListing>;

    /** 자격 증명 확인 후 로그인 이름 반환 */
    verifyCredentials(): Promise<string>;
}

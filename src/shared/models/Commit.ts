/**
 * GitHub API로부터 수집된 커밋 정보
 * Change Detector에는 불투명한 값이며, Dispatcher만 내용을 사용합니다.
 */
export interface CommitRef {
    /** 커밋의 SHA 식별자 */
    id: string;
    /** 커밋 작성자 이름 (git author name) */
    authorName: string;
    /** 커밋 날짜 (ISO 8601 문자열) */
    committedAt: string;
    /** 커밋 메시지 첫 줄 */
    messageSummary: string;
    /** 추가된 파일 수 */
    added: number;
    /** 삭제된 파일 수 */
    removed: number;
    /** 수정된 파일 수 */
    modified: number;
    /** 커밋의 GitHub 웹 URL */
    url: string;
}

/**
 * listCommitsSince 결과
 * - commits: cursor 이후의 커밋 (newest-first)
 * - discontinuity: 저장된 cursor가 더 이상 tip의 조상이 아님 (force-push 등)
 * - branch_changed: 요청한 브랜치가 더 이상 기본 브랜치가 아님 (이름 변경 등)
 */
export type CommitListing =
    | { kind: "commits"; commits: CommitRef[] }
    | { kind: "discontinuity"; tip: CommitRef | null }
    | { kind: "branch_changed"; branch: string };

/** 현재 기본 브랜치 기준으로 조회된 결과 */
export type BranchListing = Exclude<CommitListing, { kind: "branch_changed" }>;

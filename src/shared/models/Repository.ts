import { InvalidRepositoryError } from "../errors.js";

/**
 * 레포지토리 식별자: 소문자로 정규화된 `owner/name`
 */
export type RepositoryId = string;

/** 레포지토리 도달 가능 상태 */
export type ReachabilityState = "active" | "unreachable";

/**
 * 마지막으로 알림을 보낸 커밋 (레포지토리별 cursor)
 */
export interface Cursor {
    /** Commit SHA */
    commitId: string;
    /** Commit timestamp (ISO 8601) */
    committedAt: string;
}

/**
 * 레포지토리별 폴링 상태
 */
export interface RepositoryState {
    /** Repository identifier: {owner}/{name}, lowercase */
    id: RepositoryId;
    /** Default branch name (null until resolved) */
    defaultBranch: string | null;
    /** Last notified commit (null before the baseline is set) */
    cursor: Cursor | null;
    /**
     * baseline을 기록했는지 여부
     * 빈 레포지토리는 cursor 없이 true가 되며, 이후의 모든 커밋이 새 커밋입니다.
     */
    baselineEstablished: boolean;
    state: ReachabilityState;
    consecutiveFailures: number;
    /** Timestamp of last completed check (ISO 8601) */
    lastCheckedAt: string | null;
}

/**
 * cursor를 제외한 메타데이터 갱신 필드
 */
export type RepositoryMetadataPatch = Partial<
    Pick<RepositoryState, "defaultBranch" | "baselineEstablished" | "state" | "consecutiveFailures" | "lastCheckedAt">
>;

export interface ParsedRepository {
    id: RepositoryId;
    owner: string;
    name: string;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9_.-]+$/;
const URL_PREFIX = /^(?:https?:\/\/)?(?:www\.)?github\.com\//i;

/**
 * 사용자 입력을 레포지토리 식별자로 변환
 * `owner/name`, `https://github.com/owner/name(.git)` 형식을 허용합니다.
 */
export function parseRepositoryId(input: string): ParsedRepository {
    const trimmed = input.trim().replace(URL_PREFIX, "").replace(/\/+$/, "").replace(/\.git$/i, "");
    const parts = trimmed.split("/");

    if (parts.length !== 2) {
        throw new InvalidRepositoryError(input);
    }

    const [owner, name] = parts;
    if (!owner || !name || !SEGMENT_PATTERN.test(owner) || !SEGMENT_PATTERN.test(name)) {
        throw new InvalidRepositoryError(input);
    }

    const normalizedOwner = owner.toLowerCase();
    const normalizedName = name.toLowerCase();

    return {
        id: `${normalizedOwner}/${normalizedName}`,
        owner: normalizedOwner,
        name: normalizedName,
    };
}

export function repositoryUrl(id: RepositoryId): string {
    return `https://github.com/${id}`;
}

export function createRepositoryState(id: RepositoryId): RepositoryState {
    return {
        id,
        defaultBranch: null,
        cursor: null,
        baselineEstablished: false,
        state: "active",
        consecutiveFailures: 0,
        lastCheckedAt: null,
    };
}

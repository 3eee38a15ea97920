import type { RepositoryId } from "./Repository.js";

/**
 * 채팅 전송 계층으로 전달되는 커밋 정보
 */
export interface CommitPayload {
    /** Full SHA (링크용) */
    id: string;
    /** 7자리 SHA (표시용) */
    shortId: string;
    author: string;
    committedAt: string;
    message: string;
    added: number;
    removed: number;
    modified: number;
    url: string;
}

/**
 * 구독자에게 전달되는 알림
 */
export type Notification =
    | {
        type: "commit";
        repository: RepositoryId;
        repositoryUrl: string;
        commit: CommitPayload;
    }
    | {
        type: "commit_summary";
        repository: RepositoryId;
        repositoryUrl: string;
        totalCommits: number;
        omittedCommits: number;
    }
    | {
        type: "history_rewritten";
        repository: RepositoryId;
        repositoryUrl: string;
        tip: CommitPayload;
    }
    | {
        type: "repository_unreachable";
        repository: RepositoryId;
        repositoryUrl: string;
        reason: string;
    }
    | {
        type: "diagnostic";
        severity: "warning" | "critical";
        message: string;
        repository?: RepositoryId;
    };

export type NotificationType = Notification["type"];

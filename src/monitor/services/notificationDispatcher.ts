import { errorMessage } from "../../shared/errors.js";
import type { CommitRef } from "../../shared/models/Commit.js";
import type { CommitPayload, Notification } from "../../shared/models/Notification.js";
import { repositoryUrl, type RepositoryId } from "../../shared/models/Repository.js";
import type { ChatTransport } from "../transport/chatTransport.js";
import type { RuntimeStats } from "./runtimeStats.js";

const MAX_MESSAGE_LENGTH = 300;

export interface DispatcherOptions {
    /** 한 번에 개별 메시지로 보낼 최대 커밋 수 */
    maxCommitsPerDelivery: number;
    /** 진단 알림을 받을 관리자 id */
    adminIds: string[];
}

export interface DispatchReport {
    delivered: number;
    failed: number;
}

export function toCommitPayload(commit: CommitRef): CommitPayload {
    const message = commit.messageSummary.length > MAX_MESSAGE_LENGTH
        ? `${commit.messageSummary.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
        : commit.messageSummary;

    return {
        id: commit.id,
        shortId: commit.id.substring(0, 7),
        author: commit.authorName,
        committedAt: commit.committedAt,
        message,
        added: commit.added,
        removed: commit.removed,
        modified: commit.modified,
        url: commit.url,
    };
}

/**
 * 구독자별 알림 전송
 * 한 구독자의 전송 실패는 다른 구독자나 cursor에 영향을 주지 않습니다.
 */
export class NotificationDispatcher {
    constructor(
        private readonly transport: ChatTransport,
        private readonly stats: RuntimeStats,
        private readonly options: DispatcherOptions,
    ) {}

    /**
     * 새 커밋 알림 (commits는 oldest-first)
     * 최대 개수를 넘으면 요약을 먼저 보내고 최신 커밋만 시간순으로 보냅니다.
     */
    async dispatchCommits(repositoryId: RepositoryId, subscribers: string[], commits: CommitRef[]): Promise<DispatchReport> {
        if (commits.length === 0) {
            return { delivered: 0, failed: 0 };
        }

        const url = repositoryUrl(repositoryId);
        const limit = this.options.maxCommitsPerDelivery;
        const shown = commits.length > limit ? commits.slice(commits.length - limit) : commits;

        const messages: Notification[] = [];
        if (shown.length < commits.length) {
            messages.push({
                type: "commit_summary",
                repository: repositoryId,
                repositoryUrl: url,
                totalCommits: commits.length,
                omittedCommits: commits.length - shown.length,
            });
        }
        for (const commit of shown) {
            messages.push({
                type: "commit",
                repository: repositoryId,
                repositoryUrl: url,
                commit: toCommitPayload(commit),
            });
        }

        console.log(`📨 Sending ${messages.length} notifications to ${subscribers.length} subscribers for ${repositoryId}`);
        return this.fanOut(subscribers, messages);
    }

    async dispatchHistoryRewritten(repositoryId: RepositoryId, subscribers: string[], tip: CommitRef): Promise<DispatchReport> {
        return this.fanOut(subscribers, [{
            type: "history_rewritten",
            repository: repositoryId,
            repositoryUrl: repositoryUrl(repositoryId),
            tip: toCommitPayload(tip),
        }]);
    }

    async dispatchUnreachable(repositoryId: RepositoryId, subscribers: string[], reason: string): Promise<DispatchReport> {
        return this.fanOut(subscribers, [{
            type: "repository_unreachable",
            repository: repositoryId,
            repositoryUrl: repositoryUrl(repositoryId),
            reason,
        }]);
    }

    /**
     * 관리자 진단 알림 (일반 구독자에게는 보내지 않음)
     */
    async alertAdmins(severity: "warning" | "critical", message: string, repositoryId?: RepositoryId): Promise<DispatchReport> {
        if (this.options.adminIds.length === 0) {
            console.warn(`⚠️  No admin ids configured, diagnostic not delivered: ${message}`);
            return { delivered: 0, failed: 0 };
        }

        return this.fanOut(this.options.adminIds, [{
            type: "diagnostic",
            severity,
            message,
            ...(repositoryId ? { repository: repositoryId } : {}),
        }]);
    }

    /**
     * 구독자 간에는 병렬, 구독자 내에서는 순서대로 전송
     * 한 메시지가 실패해도 같은 구독자의 다음 메시지는 계속 전송합니다.
     */
    private async fanOut(subscribers: string[], messages: Notification[]): Promise<DispatchReport> {
        const report: DispatchReport = { delivered: 0, failed: 0 };

        await Promise.all(subscribers.map(async subscriberId => {
            for (const message of messages) {
                try {
                    await this.transport.send(subscriberId, message);
                    report.delivered++;
                    this.stats.recordDelivery(true);
                } catch (error) {
                    report.failed++;
                    this.stats.recordDelivery(false);
                    console.error(`❌ Failed to send ${message.type} to ${subscriberId}: ${errorMessage(error)}`);
                }
            }
        }));

        return report;
    }
}

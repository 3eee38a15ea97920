import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import {
    AuthError,
    MonitorError,
    NotFoundError,
    RateLimitError,
    TransientNetworkError,
    errorMessage,
} from "../../shared/errors.js";
import type { CommitListing, CommitRef } from "../../shared/models/Commit.js";
import { parseRepositoryId, type Cursor, type RepositoryId } from "../../shared/models/Repository.js";
import type { RepositoryClient } from "./repositoryClient.js";

/** compare API 한 페이지당 커밋 수 */
const COMPARE_PAGE_SIZE = 100;
/** compare API 최대 페이지 수 (한 번의 check에서 최대 1000 커밋) */
const MAX_COMPARE_PAGES = 10;
/** rate limit 헤더에 재시도 시간이 없을 때 기본 대기 시간 */
const DEFAULT_RETRY_AFTER_MS = 60_000;

/**
 * listCommits / compare 응답의 커밋 항목 (필요한 필드만)
 */
interface CommitItem {
    sha: string;
    html_url: string;
    commit: {
        message: string;
        author: { name?: string; date?: string } | null;
        committer: { name?: string; date?: string } | null;
    };
}

export interface GitHubRepositoryClientOptions {
    token?: string;
    /** 요청별 타임아웃 (ms) */
    timeoutMs?: number;
    /** 파일 변경 수를 조회할 최대 커밋 수 (newest 기준) */
    detailLimit?: number;
    /** 테스트 또는 커스텀 설정용 Octokit 인스턴스 */
    octokit?: Octokit;
}

/**
 * GitHub API 에러를 폴링 엔진 에러로 분류
 */
export function classifyGitHubError(error: unknown, repositoryId: RepositoryId, now: number = Date.now()): MonitorError {
    if (error instanceof MonitorError) {
        return error;
    }

    if (error instanceof RequestError) {
        const headers = error.response?.headers ?? {};
        const remaining = headers["x-ratelimit-remaining"];
        const reset = headers["x-ratelimit-reset"];
        const retryAfter = headers["retry-after"];

        if (error.status === 401) {
            return new AuthError(`GitHub rejected the credentials: ${error.message}`);
        }
        // 403과 429 모두 quota 소진을 x-ratelimit 헤더로 알립니다
        if ((error.status === 403 || error.status === 429) && remaining !== undefined && Number(remaining) === 0) {
            const resetAt = Number(reset) * 1000;
            const waitMs = Number.isFinite(resetAt) && resetAt > now ? resetAt - now : DEFAULT_RETRY_AFTER_MS;
            return new RateLimitError(`GitHub API rate limit exhausted`, waitMs, "account");
        }
        if (error.status === 429 || (error.status === 403 && retryAfter !== undefined)) {
            const seconds = Number(retryAfter);
            const waitMs = Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : DEFAULT_RETRY_AFTER_MS;
            return new RateLimitError(`GitHub API throttled requests for ${repositoryId}`, waitMs, "repository");
        }
        if (error.status === 403 || error.status === 404 || error.status === 451) {
            return new NotFoundError(repositoryId, `HTTP ${error.status}`);
        }
        return new TransientNetworkError(`GitHub API error ${error.status} for ${repositoryId}: ${error.message}`, { cause: error });
    }

    return new TransientNetworkError(`Request failed for ${repositoryId}: ${errorMessage(error)}`, { cause: error });
}

/** 브랜치나 base 커밋을 찾을 수 없음 */
function isMissingRef(error: unknown): boolean {
    return error instanceof RequestError && (error.status === 404 || error.status === 422);
}

function firstLine(message: string): string {
    return message.trim().split("\n")[0]?.trim() ?? "";
}

function toCommitRef(item: CommitItem): CommitRef {
    const author = item.commit.author;
    return {
        id: item.sha,
        authorName: author?.name ?? item.commit.committer?.name ?? "unknown",
        committedAt: author?.date ?? item.commit.committer?.date ?? "",
        messageSummary: firstLine(item.commit.message),
        added: 0,
        removed: 0,
        modified: 0,
        url: item.html_url,
    };
}

/**
 * Octokit 기반 레포지토리 어댑터
 * 기본 브랜치 조회, cursor 이후 커밋 조회, force-push 감지를 담당합니다.
 */
export class GitHubRepositoryClient implements RepositoryClient {
    private octokit: Octokit;
    private timeoutMs: number;
    private detailLimit: number;

    constructor(options: GitHubRepositoryClientOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 15_000;
        this.detailLimit = options.detailLimit ?? 20;

        if (options.octokit) {
            this.octokit = options.octokit;
            return;
        }

        const token = options.token || process.env.GITHUB_TOKEN;
        if (!token) {
            throw new Error("GITHUB_TOKEN is required for GitHubRepositoryClient");
        }
        this.octokit = new Octokit({ auth: token, userAgent: "commit-watch" });
    }

    private requestOptions() {
        return { signal: AbortSignal.timeout(this.timeoutMs) };
    }

    /**
     * 특정 레포지토리의 기본 브랜치 조회
     */
    async resolveDefaultBranch(repositoryId: RepositoryId): Promise<string> {
        const { owner, name } = parseRepositoryId(repositoryId);
        try {
            const { data } = await this.octokit.rest.repos.get({
                owner,
                repo: name,
                request: this.requestOptions(),
            });
            return data.default_branch;
        } catch (error) {
            throw classifyGitHubError(error, repositoryId);
        }
    }

    async listCommitsSince(repositoryId: RepositoryId, branch: string, cursor: Cursor | null): Promise<CommitListing> {
        try {
            if (!cursor) {
                const tip = await this.getTip(repositoryId, branch);
                return { kind: "commits", commits: tip ? [tip] : [] };
            }
            return await this.compareFrom(repositoryId, branch, cursor);
        } catch (error) {
            if (!isMissingRef(error)) {
                throw classifyGitHubError(error, repositoryId);
            }

            const moved = await this.checkBranchMoved(repositoryId, branch);
            if (moved) {
                return moved;
            }
            if (!cursor) {
                throw classifyGitHubError(error, repositoryId);
            }

            // base 커밋이 사라진 경우 (force-push 후 GC) 레포지토리 자체는 조회 가능
            console.warn(`⚠️  ${cursor.commitId.substring(0, 7)} no longer exists in ${repositoryId}`);
            return { kind: "discontinuity", tip: await this.tipOf(repositoryId, branch) };
        }
    }

    /**
     * 브랜치 전체 커밋 조회 (최대 1000개, newest-first)
     */
    async listCommitsFromStart(repositoryId: RepositoryId, branch: string): Promise<CommitListing> {
        const { owner, name } = parseRepositoryId(repositoryId);
        const items: CommitItem[] = [];

        try {
            for (let page = 1; page <= MAX_COMPARE_PAGES; page++) {
                const { data } = await this.octokit.rest.repos.listCommits({
                    owner,
                    repo: name,
                    sha: branch,
                    per_page: COMPARE_PAGE_SIZE,
                    page,
                    request: this.requestOptions(),
                });

                items.push(...data);
                if (data.length < COMPARE_PAGE_SIZE) {
                    break;
                }
                if (page === MAX_COMPARE_PAGES) {
                    console.warn(`⚠️  ${repositoryId}: more than ${items.length} commits, only the newest were retrieved`);
                }
            }
        } catch (error) {
            if (error instanceof RequestError && error.status === 409) {
                return { kind: "commits", commits: [] };
            }
            if (isMissingRef(error)) {
                const moved = await this.checkBranchMoved(repositoryId, branch);
                if (moved) {
                    return moved;
                }
            }
            throw classifyGitHubError(error, repositoryId);
        }

        const commits = items.map(toCommitRef);
        await this.attachFileCounts(repositoryId, commits.slice(0, this.detailLimit));
        return { kind: "commits", commits };
    }

    /**
     * cursor 이후 커밋을 compare API로 조회
     * 실패는 분류하지 않고 그대로 던집니다.
     */
    private async compareFrom(repositoryId: RepositoryId, branch: string, cursor: Cursor): Promise<CommitListing> {
        const { owner, name } = parseRepositoryId(repositoryId);
        const items: CommitItem[] = [];
        let totalCommits = 0;

        for (let page = 1; page <= MAX_COMPARE_PAGES; page++) {
            const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
                owner,
                repo: name,
                basehead: `${cursor.commitId}...${branch}`,
                per_page: COMPARE_PAGE_SIZE,
                page,
                request: this.requestOptions(),
            });

            if (data.status === "identical") {
                return { kind: "commits", commits: [] };
            }
            if (data.status === "behind" || data.status === "diverged") {
                console.warn(`⚠️  ${repositoryId}@${branch} is ${data.status} from ${cursor.commitId.substring(0, 7)}`);
                return { kind: "discontinuity", tip: await this.getTip(repositoryId, branch) };
            }

            totalCommits = data.total_commits;
            items.push(...data.commits);
            if (items.length >= totalCommits || data.commits.length === 0) {
                break;
            }
        }

        if (items.length < totalCommits) {
            console.warn(`⚠️  ${repositoryId}: ${totalCommits} new commits, only ${items.length} retrieved`);
        }

        // compare 결과는 oldest-first
        const commits = items.map(toCommitRef).reverse();
        await this.attachFileCounts(repositoryId, commits.slice(0, this.detailLimit));
        return { kind: "commits", commits };
    }

    /**
     * 요청한 브랜치를 찾을 수 없을 때 기본 브랜치가 바뀌었는지 확인
     * 레포지토리 자체가 없으면 NotFoundError를 던집니다.
     */
    private async checkBranchMoved(repositoryId: RepositoryId, branch: string): Promise<CommitListing | null> {
        const current = await this.resolveDefaultBranch(repositoryId);
        if (current === branch) {
            return null;
        }
        console.warn(`⚠️  Default branch of ${repositoryId} changed: ${branch} → ${current}`);
        return { kind: "branch_changed", branch: current };
    }

    private async tipOf(repositoryId: RepositoryId, branch: string): Promise<CommitRef | null> {
        try {
            return await this.getTip(repositoryId, branch);
        } catch (error) {
            throw classifyGitHubError(error, repositoryId);
        }
    }

    /**
     * 특정 브랜치의 최신 커밋 조회 (빈 레포지토리면 null)
     * 409 이외의 실패는 분류하지 않고 그대로 던집니다.
     */
    private async getTip(repositoryId: RepositoryId, branch: string): Promise<CommitRef | null> {
        const { owner, name } = parseRepositoryId(repositoryId);
        try {
            const { data } = await this.octokit.rest.repos.listCommits({
                owner,
                repo: name,
                sha: branch,
                per_page: 1,
                request: this.requestOptions(),
            });

            const first = data[0];
            if (!first) {
                return null;
            }

            const tip = toCommitRef(first);
            await this.attachFileCounts(repositoryId, [tip]);
            return tip;
        } catch (error) {
            // 409: Git Repository is empty
            if (error instanceof RequestError && error.status === 409) {
                console.log(`   ${repositoryId} is empty`);
                return null;
            }
            throw error;
        }
    }

    /**
     * 커밋 상세 조회로 추가/삭제/수정 파일 수 계산
     * 상세 조회 실패는 알림을 막지 않습니다.
     */
    private async attachFileCounts(repositoryId: RepositoryId, commits: CommitRef[]): Promise<void> {
        const { owner, name } = parseRepositoryId(repositoryId);

        for (const commit of commits) {
            try {
                const { data } = await this.octokit.rest.repos.getCommit({
                    owner,
                    repo: name,
                    ref: commit.id,
                    request: this.requestOptions(),
                });

                for (const file of data.files ?? []) {
                    if (file.status === "added") commit.added++;
                    else if (file.status === "removed") commit.removed++;
                    else if (file.status === "modified") commit.modified++;
                }
            } catch (error) {
                const failure = classifyGitHubError(error, repositoryId);
                if (failure instanceof AuthError) {
                    throw failure;
                }
                console.warn(`⚠️  Failed to get commit details for ${commit.id.substring(0, 7)}: ${failure.message}`);
            }
        }
    }

    async verifyCredentials(): Promise<string> {
        try {
            const { data } = await this.octokit.rest.users.getAuthenticated({
                request: this.requestOptions(),
            });
            return data.login;
        } catch (error) {
            throw classifyGitHubError(error, "(credentials)");
        }
    }
}

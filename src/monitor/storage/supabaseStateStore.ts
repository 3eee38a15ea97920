import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { StorageError } from "../../shared/errors.js";
import type {
    Cursor,
    RepositoryId,
    RepositoryMetadataPatch,
    RepositoryState,
} from "../../shared/models/Repository.js";
import type { StateStore } from "./types.js";

export const SUBSCRIPTIONS_TABLE = "subscriptions";
export const CURSORS_TABLE = "repository_cursors";

/** Postgres unique_violation */
const UNIQUE_VIOLATION = "23505";

/**
 * repository_cursors 테이블 row
 */
interface CursorRow {
    repository_id: string;
    last_commit_id: string | null;
    last_commit_timestamp: string | null;
    baseline_established: boolean;
    default_branch: string | null;
    consecutive_failures: number;
    state: "active" | "unreachable";
    last_checked_at: string | null;
}

function toRepositoryState(row: CursorRow): RepositoryState {
    return {
        id: row.repository_id,
        defaultBranch: row.default_branch,
        cursor: row.last_commit_id
            ? { commitId: row.last_commit_id, committedAt: row.last_commit_timestamp ?? "" }
            : null,
        baselineEstablished: row.baseline_established || row.last_commit_id !== null,
        state: row.state,
        consecutiveFailures: row.consecutive_failures,
        lastCheckedAt: row.last_checked_at,
    };
}

function toMetadataColumns(patch: RepositoryMetadataPatch): Partial<CursorRow> {
    const columns: Partial<CursorRow> = {};
    if (patch.defaultBranch !== undefined) columns.default_branch = patch.defaultBranch;
    if (patch.baselineEstablished !== undefined) columns.baseline_established = patch.baselineEstablished;
    if (patch.state !== undefined) columns.state = patch.state;
    if (patch.consecutiveFailures !== undefined) columns.consecutive_failures = patch.consecutiveFailures;
    if (patch.lastCheckedAt !== undefined) columns.last_checked_at = patch.lastCheckedAt;
    return columns;
}

/**
 * Supabase 기반 상태 저장소
 * 파일 시스템 의존성 없이 구독과 cursor를 Postgres 테이블에 저장합니다.
 */
export class SupabaseStateStore implements StateStore {
    private supabase: SupabaseClient;

    /**
     * @param fetchImpl 테스트에서 PostgREST 응답을 대신할 fetch
     */
    constructor(supabaseUrl?: string, supabaseKey?: string, fetchImpl?: typeof fetch) {
        const url = supabaseUrl || process.env.SUPABASE_URL;
        const key = supabaseKey || process.env.SUPABASE_SERVICE_ROLE_KEY;

        if (!url || !key) {
            throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required");
        }

        this.supabase = createClient(url, key, {
            auth: {
                autoRefreshToken: false,
                persistSession: false,
            },
            ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
        });
    }

    async get(repositoryId: RepositoryId): Promise<RepositoryState | null> {
        const { data, error } = await this.supabase
            .from(CURSORS_TABLE)
            .select("*")
            .eq("repository_id", repositoryId)
            .maybeSingle<CursorRow>();

        if (error) {
            throw new StorageError(`Failed to get repository state: ${error.message}`);
        }

        return data ? toRepositoryState(data) : null;
    }

    /**
     * 조건부 UPDATE로 compare-and-set 구현
     * expectedCommitId가 null이고 row가 없으면 INSERT하며, 동시 INSERT는 unique 제약으로 거부됩니다.
     */
    async compareAndSet(repositoryId: RepositoryId, expectedCommitId: string | null, newCursor: Cursor): Promise<boolean> {
        const columns = {
            last_commit_id: newCursor.commitId,
            last_commit_timestamp: newCursor.committedAt,
            baseline_established: true,
            updated_at: new Date().toISOString(),
        };

        const base = this.supabase
            .from(CURSORS_TABLE)
            .update(columns)
            .eq("repository_id", repositoryId);
        const conditional = expectedCommitId === null
            ? base.is("last_commit_id", null)
            : base.eq("last_commit_id", expectedCommitId);

        const { data, error } = await conditional.select("repository_id");
        if (error) {
            throw new StorageError(`Failed to update cursor: ${error.message}`);
        }
        if (data.length > 0) {
            return true;
        }
        if (expectedCommitId !== null) {
            return false;
        }

        const { error: insertError } = await this.supabase
            .from(CURSORS_TABLE)
            .insert({ repository_id: repositoryId, ...columns });

        if (insertError) {
            if (insertError.code === UNIQUE_VIOLATION) {
                return false;
            }
            throw new StorageError(`Failed to insert cursor: ${insertError.message}`);
        }
        return true;
    }

    async updateMetadata(repositoryId: RepositoryId, patch: RepositoryMetadataPatch): Promise<void> {
        const { error } = await this.supabase
            .from(CURSORS_TABLE)
            .upsert({
                repository_id: repositoryId,
                ...toMetadataColumns(patch),
                updated_at: new Date().toISOString(),
            }, {
                onConflict: "repository_id",
            });

        if (error) {
            throw new StorageError(`Failed to update repository metadata: ${error.message}`);
        }
    }

    async subscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean> {
        const { data, error } = await this.supabase
            .from(SUBSCRIPTIONS_TABLE)
            .upsert({
                subscriber_id: subscriberId,
                repository_id: repositoryId,
            }, {
                onConflict: "subscriber_id,repository_id",
                ignoreDuplicates: true,
            })
            .select("repository_id");

        if (error) {
            throw new StorageError(`Failed to subscribe: ${error.message}`);
        }
        return data.length > 0;
    }

    async unsubscribe(subscriberId: string, repositoryId: RepositoryId): Promise<boolean> {
        const { data, error } = await this.supabase
            .from(SUBSCRIPTIONS_TABLE)
            .delete()
            .eq("subscriber_id", subscriberId)
            .eq("repository_id", repositoryId)
            .select("repository_id");

        if (error) {
            throw new StorageError(`Failed to unsubscribe: ${error.message}`);
        }
        return data.length > 0;
    }

    async subscribersOf(repositoryId: RepositoryId): Promise<string[]> {
        const { data, error } = await this.supabase
            .from(SUBSCRIPTIONS_TABLE)
            .select("subscriber_id")
            .eq("repository_id", repositoryId)
            .returns<Array<{ subscriber_id: string }>>();

        if (error) {
            throw new StorageError(`Failed to get subscribers: ${error.message}`);
        }
        return data.map(row => row.subscriber_id);
    }

    async repositoriesOf(subscriberId: string): Promise<RepositoryId[]> {
        const { data, error } = await this.supabase
            .from(SUBSCRIPTIONS_TABLE)
            .select("repository_id")
            .eq("subscriber_id", subscriberId)
            .order("repository_id", { ascending: true })
            .returns<Array<{ repository_id: string }>>();

        if (error) {
            throw new StorageError(`Failed to get repositories: ${error.message}`);
        }
        return data.map(row => row.repository_id);
    }

    async allActiveRepositories(): Promise<RepositoryId[]> {
        const { data, error } = await this.supabase
            .from(SUBSCRIPTIONS_TABLE)
            .select("repository_id")
            .returns<Array<{ repository_id: string }>>();

        if (error) {
            throw new StorageError(`Failed to list active repositories: ${error.message}`);
        }
        return [...new Set(data.map(row => row.repository_id))];
    }

    /**
     * Health check
     */
    async healthCheck(): Promise<boolean> {
        try {
            const { error } = await this.supabase
                .from(CURSORS_TABLE)
                .select("repository_id", { count: "exact", head: true })
                .limit(1);

            return !error;
        } catch {
            return false;
        }
    }

    getClient(): SupabaseClient {
        return this.supabase;
    }
}

import type { CommitRef } from "./Commit.js";
import type { Cursor } from "./Repository.js";
import type { FailureKind } from "../errors.js";

export type SkipReason = "unreachable" | "backoff" | "rate_limited" | "halted" | "stopped";

/**
 * 한 번의 check cycle 결과 (로그 외에는 저장하지 않음)
 */
export type CheckResult =
    | { status: "no_change"; baseline: boolean }
    | { status: "new_commits"; commits: CommitRef[]; cursor: Cursor }
    | { status: "history_rewritten"; tip: CommitRef; cursor: Cursor }
    | {
        status: "failure";
        kind: FailureKind;
        detail: string;
        /** 다음 확인 가능 시각 (epoch ms), null이면 다음 tick */
        retryAt: number | null;
        /** account 전체 rate limit */
        accountWide: boolean;
        /** 자격 증명 거부 등 프로세스 전체 중단 */
        fatal: boolean;
    }
    | { status: "skipped"; reason: SkipReason; until: number | null };

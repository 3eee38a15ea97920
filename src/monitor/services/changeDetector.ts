import type { BranchListing, CommitRef } from "../../shared/models/Commit.js";
import type { Cursor } from "../../shared/models/Repository.js";

export type DetectionResult =
    /** 첫 조회: 알림 없이 tip을 cursor로 기록 (빈 레포지토리면 null) */
    | { kind: "baseline"; newCursor: Cursor | null }
    | { kind: "no_change" }
    /** commits는 oldest-first */
    | { kind: "new_commits"; commits: CommitRef[]; newCursor: Cursor }
    /** history가 재작성됨: 새 tip으로 재기준 */
    | { kind: "history_rewritten"; tip: CommitRef; newCursor: Cursor };

export function cursorOf(commit: CommitRef): Cursor {
    return { commitId: commit.id, committedAt: commit.committedAt };
}

/**
 * 저장된 cursor와 새로 조회한 커밋 목록(newest-first)을 비교하여 새 커밋 계산
 *
 * @param baselineEstablished cursor 없이 baseline이 기록된 상태(빈 레포지토리)면 listing 전체가 새 커밋
 */
export function detectChanges(stored: Cursor | null, listing: BranchListing, baselineEstablished = false): DetectionResult {
    if (!stored && baselineEstablished) {
        const commits = listing.kind === "commits" ? listing.commits : listing.tip ? [listing.tip] : [];
        const newest = commits[0];
        if (!newest) {
            return { kind: "no_change" };
        }
        return { kind: "new_commits", commits: [...commits].reverse(), newCursor: cursorOf(newest) };
    }

    if (listing.kind === "discontinuity") {
        const tip = listing.tip;
        if (!stored) {
            return { kind: "baseline", newCursor: tip ? cursorOf(tip) : null };
        }
        if (!tip || tip.id === stored.commitId) {
            return { kind: "no_change" };
        }
        return { kind: "history_rewritten", tip, newCursor: cursorOf(tip) };
    }

    const fetched = listing.commits;
    const newest = fetched[0];

    if (!stored) {
        return { kind: "baseline", newCursor: newest ? cursorOf(newest) : null };
    }

    // 어댑터가 cursor 이전 커밋까지 반환한 경우 잘라냄
    const storedIndex = fetched.findIndex(commit => commit.id === stored.commitId);
    const fresh = storedIndex === -1 ? fetched : fetched.slice(0, storedIndex);
    const freshNewest = fresh[0];

    if (!freshNewest) {
        return { kind: "no_change" };
    }

    return {
        kind: "new_commits",
        commits: [...fresh].reverse(),
        newCursor: cursorOf(freshNewest),
    };
}

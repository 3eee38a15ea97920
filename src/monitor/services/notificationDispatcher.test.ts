import { beforeEach, describe, expect, it, vi } from "vitest";
import { makeCommit, RecordingTransport } from "../testing/fakes.js";
import { NotificationDispatcher, toCommitPayload } from "./notificationDispatcher.js";
import { RuntimeStats } from "./runtimeStats.js";

function commits(count: number) {
    return Array.from({ length: count }, (_, i) => makeCommit(`c${i + 1}000000`));
}

describe("toCommitPayload", () => {
    it("shortens the id and keeps the file counts", () => {
        const payload = toCommitPayload(makeCommit("0123456789abcdef", { added: 2, removed: 1, modified: 3 }));

        expect(payload).toEqual({
            id: "0123456789abcdef",
            shortId: "0123456",
            author: "Test Author",
            committedAt: "2026-01-01T00:00:00.000Z",
            message: "Commit 0123456789abcdef",
            added: 2,
            removed: 1,
            modified: 3,
            url: "https://github.com/octo/widgets/commit/0123456789abcdef",
        });
    });

    it("truncates long messages to 300 characters", () => {
        const payload = toCommitPayload(makeCommit("abc", { messageSummary: "x".repeat(301) }));

        expect(payload.message).toBe(`${"x".repeat(297)}...`);
        expect(payload.message).toHaveLength(300);
    });

    it("keeps a message of exactly 300 characters", () => {
        expect(toCommitPayload(makeCommit("abc", { messageSummary: "y".repeat(300) })).message).toBe("y".repeat(300));
    });
});

describe("NotificationDispatcher", () => {
    let transport: RecordingTransport;
    let stats: RuntimeStats;
    let dispatcher: NotificationDispatcher;

    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        transport = new RecordingTransport();
        stats = new RuntimeStats();
        dispatcher = new NotificationDispatcher(transport, stats, { maxCommitsPerDelivery: 5, adminIds: ["900"] });
    });

    it("sends every commit to every subscriber in chronological order", async () => {
        const report = await dispatcher.dispatchCommits("octo/widgets", ["100", "200"], commits(3));

        expect(report).toEqual({ delivered: 6, failed: 0 });
        expect(transport.commitIdsFor("100")).toEqual(["c1000000", "c2000000", "c3000000"]);
        expect(transport.commitIdsFor("200")).toEqual(["c1000000", "c2000000", "c3000000"]);
        expect(transport.sent[0]?.notification).toMatchObject({
            type: "commit",
            repository: "octo/widgets",
            repositoryUrl: "https://github.com/octo/widgets",
        });
    });

    it("summarizes large batches and shows only the newest commits", async () => {
        await dispatcher.dispatchCommits("octo/widgets", ["100"], commits(8));

        const received = transport.to("100");
        expect(received[0]).toEqual({
            type: "commit_summary",
            repository: "octo/widgets",
            repositoryUrl: "https://github.com/octo/widgets",
            totalCommits: 8,
            omittedCommits: 3,
        });
        expect(transport.commitIdsFor("100")).toEqual(["c4000000", "c5000000", "c6000000", "c7000000", "c8000000"]);
    });

    it("keeps delivering to other subscribers when one fails", async () => {
        transport.failFor.add("100");

        const report = await dispatcher.dispatchCommits("octo/widgets", ["100", "200"], commits(2));

        expect(report).toEqual({ delivered: 2, failed: 2 });
        expect(transport.commitIdsFor("200")).toEqual(["c1000000", "c2000000"]);
        expect(stats.snapshot()).toMatchObject({ notificationsSent: 2, deliveryFailures: 2 });
    });

    it("sends nothing for an empty batch", async () => {
        expect(await dispatcher.dispatchCommits("octo/widgets", ["100"], [])).toEqual({ delivered: 0, failed: 0 });
        expect(transport.sent).toEqual([]);
    });

    it("announces a history rewrite with the new tip", async () => {
        await dispatcher.dispatchHistoryRewritten("octo/widgets", ["100"], makeCommit("fedcba9876"));

        expect(transport.to("100")).toEqual([{
            type: "history_rewritten",
            repository: "octo/widgets",
            repositoryUrl: "https://github.com/octo/widgets",
            tip: toCommitPayload(makeCommit("fedcba9876")),
        }]);
    });

    it("announces an unreachable repository", async () => {
        await dispatcher.dispatchUnreachable("octo/gone", ["100"], "Repository octo/gone not found");

        expect(transport.to("100")).toEqual([{
            type: "repository_unreachable",
            repository: "octo/gone",
            repositoryUrl: "https://github.com/octo/gone",
            reason: "Repository octo/gone not found",
        }]);
    });

    it("sends diagnostics only to admins", async () => {
        await dispatcher.alertAdmins("warning", "octo/widgets keeps timing out", "octo/widgets");

        expect(transport.sent).toEqual([{
            subscriberId: "900",
            notification: {
                type: "diagnostic",
                severity: "warning",
                message: "octo/widgets keeps timing out",
                repository: "octo/widgets",
            },
        }]);
    });

    it("drops diagnostics when no admin is configured", async () => {
        const quiet = new NotificationDispatcher(transport, stats, { maxCommitsPerDelivery: 5, adminIds: [] });

        expect(await quiet.alertAdmins("critical", "halted")).toEqual({ delivered: 0, failed: 0 });
        expect(transport.sent).toEqual([]);
    });
});

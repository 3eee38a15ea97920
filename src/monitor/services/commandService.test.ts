import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidRepositoryError, NotFoundError } from "../../shared/errors.js";
import { createHarness, makeCommit } from "../testing/fakes.js";
import { CommandService } from "./commandService.js";
import { PollingScheduler } from "./pollingScheduler.js";

const REPO = "octo/widgets";

describe("CommandService", () => {
    let h: ReturnType<typeof createHarness>;
    let scheduler: PollingScheduler;
    let commands: CommandService;

    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);

        h = createHarness();
        h.client.addRepository(REPO, [makeCommit("aaa1111"), makeCommit("bbb2222")]);
        scheduler = new PollingScheduler(h.store, h.checker, {
            intervalMs: 60_000,
            cycleTimeoutMs: 5_000,
            clock: h.clock.read,
        });
        commands = new CommandService({
            store: h.store,
            subscriptions: h.store,
            client: h.client,
            scheduler,
            stats: h.stats,
            checkIntervalSeconds: 60,
        });
    });

    afterEach(async () => {
        await scheduler.stop();
        vi.restoreAllMocks();
    });

    describe("add", () => {
        it("subscribes and records a silent baseline", async () => {
            const result = await commands.add("100", "https://github.com/Octo/Widgets");

            expect(result).toEqual({
                repository: REPO,
                repositoryUrl: "https://github.com/octo/widgets",
                defaultBranch: "main",
                created: true,
                baseline: { status: "no_change", baseline: true },
            });
            expect(await h.store.subscribersOf(REPO)).toEqual(["100"]);
            expect((await h.store.get(REPO))?.cursor?.commitId).toBe("bbb2222");
            expect(h.transport.sent).toEqual([]);
        });

        it("is idempotent for the same subscriber", async () => {
            await commands.add("100", REPO);
            const again = await commands.add("100", REPO);

            expect(again).toMatchObject({ created: false, baseline: null, defaultBranch: "main" });
            expect(await h.store.subscribersOf(REPO)).toEqual(["100"]);
        });

        it("reuses the cursor of a repository someone else already follows", async () => {
            await commands.add("100", REPO);
            h.client.push(REPO, makeCommit("ccc3333"));

            const result = await commands.add("200", REPO);

            expect(result).toMatchObject({ created: true, baseline: null });
            expect(h.client.callsFor(REPO, "resolveDefaultBranch")).toHaveLength(1);
            expect((await h.store.get(REPO))?.cursor?.commitId).toBe("bbb2222");
        });

        it("keeps the empty baseline when another chat follows an empty repository", async () => {
            h.client.addRepository("octo/empty", []);
            await commands.add("100", "octo/empty");
            h.client.push("octo/empty", makeCommit("eee1111"));

            const result = await commands.add("200", "octo/empty");

            expect(result).toMatchObject({ created: true, baseline: null });
            expect(await scheduler.checkNow("octo/empty")).toMatchObject({ status: "new_commits" });
            expect(h.transport.commitIdsFor("100")).toEqual(["eee1111"]);
            expect(h.transport.commitIdsFor("200")).toEqual(["eee1111"]);
        });

        it("undoes the subscription when the repository does not exist", async () => {
            h.client.failNext("octo/gone", new NotFoundError("octo/gone", "HTTP 404"));

            await expect(commands.add("100", "octo/gone")).rejects.toThrow(NotFoundError);
            expect(await h.store.repositoriesOf("100")).toEqual([]);
        });

        it("rejects malformed input without subscribing", async () => {
            await expect(commands.add("100", "not-a-repo")).rejects.toThrow(InvalidRepositoryError);
            expect(await h.store.allActiveRepositories()).toEqual([]);
        });

        it("reactivates an unreachable repository", async () => {
            await commands.add("100", REPO);
            await h.store.updateMetadata(REPO, { state: "unreachable", consecutiveFailures: 3 });

            await commands.add("200", REPO);

            expect(await h.store.get(REPO)).toMatchObject({ state: "active", consecutiveFailures: 0 });
            expect(h.client.callsFor(REPO, "resolveDefaultBranch")).toHaveLength(2);
        });
    });

    describe("remove", () => {
        it("unsubscribes once", async () => {
            await commands.add("100", REPO);

            expect(await commands.remove("100", "Octo/Widgets")).toEqual({ repository: REPO, removed: true });
            expect(await commands.remove("100", REPO)).toEqual({ repository: REPO, removed: false });
            expect(await h.store.allActiveRepositories()).toEqual([]);
        });
    });

    it("lists subscriptions with their state", async () => {
        await commands.add("100", REPO);

        expect(await commands.list("100")).toEqual([{
            repository: REPO,
            repositoryUrl: "https://github.com/octo/widgets",
            defaultBranch: "main",
            state: "active",
            lastCommitId: "bbb2222",
            lastCheckedAt: "2026-03-01T00:00:00.000Z",
        }]);
        expect(await commands.list("200")).toEqual([]);
    });

    it("checks every subscribed repository on demand", async () => {
        await commands.add("100", REPO);
        h.client.push(REPO, makeCommit("ccc3333"));

        const results = await commands.check("100");

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ repository: REPO, result: { status: "new_commits" } });
        expect(h.transport.commitIdsFor("100")).toEqual(["ccc3333"]);
    });

    it("reports statistics", async () => {
        await commands.add("100", REPO);
        h.client.push(REPO, makeCommit("ccc3333"));
        await commands.check("100");

        expect(await commands.stats("100")).toMatchObject({
            subscribedRepositories: 1,
            trackedRepositories: 1,
            checkIntervalSeconds: 60,
            recentRepositories: [REPO],
            checksPerformed: 2,
            commitsDetected: 1,
            notificationsSent: 1,
        });
    });
});

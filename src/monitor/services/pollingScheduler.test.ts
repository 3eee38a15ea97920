import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuthError, RateLimitError, TransientNetworkError } from "../../shared/errors.js";
import { createHarness, makeCommit } from "../testing/fakes.js";
import { PollingScheduler, type PollingSchedulerOptions } from "./pollingScheduler.js";

const SLOW = "octo/slow";
const FAST = "octo/fast";

describe("PollingScheduler", () => {
    let h: ReturnType<typeof createHarness>;
    let scheduler: PollingScheduler;

    function createScheduler(options: Partial<PollingSchedulerOptions> = {}): PollingScheduler {
        return new PollingScheduler(h.store, h.checker, {
            intervalMs: 60_000,
            cycleTimeoutMs: 5_000,
            clock: h.clock.read,
            ...options,
        });
    }

    async function baseline(): Promise<void> {
        const summary = await scheduler.tick();
        await summary.settled;
    }

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);

        h = createHarness({ adminIds: ["900"] });
        h.client.addRepository(SLOW, [makeCommit("51000000")]);
        h.client.addRepository(FAST, [makeCommit("f1000000")]);
        await h.store.subscribe("100", SLOW);
        await h.store.subscribe("100", FAST);
        scheduler = createScheduler();
    });

    afterEach(async () => {
        await scheduler.stop();
        vi.restoreAllMocks();
    });

    it("checks every subscribed repository on a tick", async () => {
        const summary = await scheduler.tick();

        expect(summary.started).toEqual([SLOW, FAST]);
        expect(await summary.settled).toEqual([
            { status: "no_change", baseline: true },
            { status: "no_change", baseline: true },
        ]);
    });

    it("does not let a slow repository delay the others", async () => {
        await baseline();
        h.client.push(SLOW, makeCommit("52000000"));
        h.client.push(FAST, makeCommit("f2000000"));
        const release = h.client.block(SLOW);

        const first = await scheduler.tick();
        await vi.waitFor(() => expect(h.transport.commitIdsFor("100")).toEqual(["f2000000"]));
        expect(scheduler.phaseOf(SLOW)).toBe("checking");

        h.client.push(FAST, makeCommit("f3000000"));
        const second = await scheduler.tick();
        expect(second.started).toEqual([FAST]);
        expect(second.skipped).toEqual([SLOW]);
        await second.settled;

        release();
        await first.settled;
        expect(h.transport.commitIdsFor("100")).toEqual(["f2000000", "f3000000", "52000000"]);
    });

    it("joins a manual check to the check already running", async () => {
        await baseline();
        h.client.push(FAST, makeCommit("f2000000"));
        const release = h.client.block(FAST);

        const tick = await scheduler.tick();
        const manual = scheduler.checkNow(FAST);
        release();

        const [results, manualResult] = await Promise.all([tick.settled, manual]);
        expect(manualResult).toEqual(results[1]);
        expect(h.client.callsFor(FAST)).toHaveLength(2);
        expect(h.transport.commitIdsFor("100")).toEqual(["f2000000"]);
    });

    it("waits out the backoff after a transient failure", async () => {
        await baseline();
        h.client.failNext(FAST, new TransientNetworkError("timeout"));
        await baseline();

        expect(scheduler.phaseOf(FAST)).toBe("backoff");
        const during = await scheduler.tick();
        expect(during.started).toEqual([SLOW]);
        expect(during.skipped).toEqual([FAST]);
        await during.settled;

        h.clock.advance(60_000);
        expect(scheduler.phaseOf(FAST)).toBe("idle");
        const after = await scheduler.tick();
        expect(after.started).toEqual([SLOW, FAST]);
        await after.settled;
    });

    it("lets a manual check bypass the transient backoff", async () => {
        await baseline();
        h.client.failNext(FAST, new TransientNetworkError("timeout"));
        await baseline();
        h.client.push(FAST, makeCommit("f2000000"));

        expect(await scheduler.checkNow(FAST)).toMatchObject({ status: "new_commits" });
        expect(scheduler.phaseOf(FAST)).toBe("idle");
    });

    it("pauses every repository on an account-wide rate limit", async () => {
        await baseline();
        h.client.failNext(FAST, new RateLimitError("API rate limit exceeded", 120_000, "account"));
        await baseline();

        const paused = await scheduler.tick();
        expect(paused.started).toEqual([]);
        expect(paused.skipped).toEqual([SLOW, FAST]);
        expect(await scheduler.checkNow(SLOW)).toEqual({
            status: "skipped",
            reason: "rate_limited",
            until: h.clock.now + 120_000,
        });

        h.clock.advance(120_000);
        const resumed = await scheduler.tick();
        expect(resumed.started).toEqual([SLOW, FAST]);
        await resumed.settled;
    });

    it("refuses manual checks of a rate-limited repository", async () => {
        await baseline();
        h.client.failNext(FAST, new RateLimitError("secondary rate limit", 30_000, "repository"));
        await baseline();

        expect(await scheduler.checkNow(FAST)).toEqual({
            status: "skipped",
            reason: "rate_limited",
            until: h.clock.now + 30_000,
        });
        expect(await scheduler.checkNow(SLOW)).toEqual({ status: "no_change", baseline: false });
    });

    it("halts when the credentials are rejected", async () => {
        const onFatal = vi.fn();
        scheduler = createScheduler({ onFatal });
        await baseline();
        h.client.failNext(FAST, new AuthError("Bad credentials"));
        await baseline();

        expect(scheduler.isHalted()).toBe(true);
        expect(onFatal).toHaveBeenCalledWith("Bad credentials");
        expect((await scheduler.tick()).started).toEqual([]);
        expect(await scheduler.checkNow(SLOW)).toEqual({ status: "skipped", reason: "halted", until: null });
    });

    it("reports a hung check as timed out but never runs it twice", async () => {
        scheduler = createScheduler({ cycleTimeoutMs: 20 });
        const timedOut = {
            status: "failure",
            kind: "transient",
            detail: "Check cycle timed out after 20ms",
            retryAt: null,
            accountWide: false,
            fatal: false,
        };
        const release = h.client.block(SLOW);

        const summary = await scheduler.tick();
        const results = await summary.settled;

        expect(results[0]).toEqual(timedOut);
        expect(scheduler.phaseOf(SLOW)).toBe("checking");
        expect(await scheduler.checkNow(SLOW)).toEqual(timedOut);

        const next = await scheduler.tick();
        expect(next.skipped).toEqual([SLOW]);
        await next.settled;
        expect(h.client.callsFor(SLOW)).toHaveLength(1);

        release();
        await vi.waitFor(() => expect(scheduler.phaseOf(SLOW)).toBe("idle"));
        expect((await h.store.get(SLOW))?.cursor?.commitId).toBe("51000000");
    });

    it("waits for a timed-out check on stop", async () => {
        scheduler = createScheduler({ cycleTimeoutMs: 20 });
        await baseline();
        h.client.push(SLOW, makeCommit("52000000"));
        const release = h.client.block(SLOW);

        const summary = await scheduler.tick();
        await summary.settled;
        const stopping = scheduler.stop();
        release();
        await stopping;

        expect(h.transport.commitIdsFor("100")).toEqual(["52000000"]);
    });

    it("keeps checking other repositories when one fails", async () => {
        await baseline();
        h.client.failNext(SLOW, new TransientNetworkError("connection reset"));
        h.client.push(FAST, makeCommit("f2000000"));

        const summary = await scheduler.tick();
        const results = await summary.settled;

        expect(summary.started).toEqual([SLOW, FAST]);
        expect(results[0]).toMatchObject({ status: "failure", kind: "transient", detail: "connection reset" });
        expect(results[1]).toMatchObject({ status: "new_commits" });
        expect(h.transport.commitIdsFor("100")).toEqual(["f2000000"]);
    });

    it("starts no check when stopped while listing repositories", async () => {
        let finishListing: (ids: string[]) => void = () => undefined;
        vi.spyOn(h.store, "allActiveRepositories").mockReturnValueOnce(new Promise<string[]>(resolve => {
            finishListing = resolve;
        }));

        const ticking = scheduler.tick();
        let stopped = false;
        const stopping = scheduler.stop().then(() => {
            stopped = true;
        });
        await Promise.resolve();
        expect(stopped).toBe(false);

        finishListing([SLOW, FAST]);
        await stopping;

        expect((await ticking).started).toEqual([]);
        expect(h.client.calls).toEqual([]);
    });

    it("finishes running checks on stop and starts no new ones", async () => {
        await baseline();
        h.client.push(SLOW, makeCommit("52000000"));
        const release = h.client.block(SLOW);

        await scheduler.tick();
        const stopping = scheduler.stop();
        release();
        await stopping;

        expect(h.transport.commitIdsFor("100")).toEqual(["52000000"]);
        expect((await scheduler.tick()).started).toEqual([]);
        expect(await scheduler.checkNow(FAST)).toEqual({ status: "skipped", reason: "stopped", until: null });
    });

    it("runs the first tick as soon as it starts", async () => {
        scheduler.start();

        await vi.waitFor(() => expect(h.client.callsFor(FAST)).toHaveLength(1));
        await scheduler.stop();
        expect(h.client.callsFor(SLOW)).toHaveLength(1);
    });
});

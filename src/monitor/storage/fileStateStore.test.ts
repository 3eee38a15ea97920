import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StorageError } from "../../shared/errors.js";
import { FileStateStore } from "./fileStateStore.js";

const cursorA = { commitId: "aaa1111", committedAt: "2026-01-01T00:00:00.000Z" };

describe("FileStateStore", () => {
    let dir: string;
    let statePath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "commit-watch-"));
        statePath = path.join(dir, "state.json");
        vi.spyOn(console, "log").mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it("survives a restart", async () => {
        const first = new FileStateStore(statePath);
        await first.subscribe("100", "octo/widgets");
        await first.updateMetadata("octo/widgets", { defaultBranch: "main" });
        await first.compareAndSet("octo/widgets", null, cursorA);

        const second = new FileStateStore(statePath);

        expect(await second.subscribersOf("octo/widgets")).toEqual(["100"]);
        expect(await second.get("octo/widgets")).toMatchObject({ defaultBranch: "main", cursor: cursorA });
    });

    it("remembers an empty baseline across restarts", async () => {
        const first = new FileStateStore(statePath);
        await first.updateMetadata("octo/empty", { defaultBranch: "main", baselineEstablished: true });

        const second = new FileStateStore(statePath);

        expect(await second.get("octo/empty")).toMatchObject({ cursor: null, baselineEstablished: true });
    });

    it("derives the baseline flag for files that predate it", async () => {
        fs.writeFileSync(statePath, JSON.stringify({
            subscriptions: [],
            repositories: {
                "octo/widgets": {
                    id: "octo/widgets",
                    defaultBranch: "main",
                    cursor: cursorA,
                    state: "active",
                    consecutiveFailures: 0,
                    lastCheckedAt: null,
                },
                "octo/fresh": {
                    id: "octo/fresh",
                    defaultBranch: null,
                    cursor: null,
                    state: "active",
                    consecutiveFailures: 0,
                    lastCheckedAt: null,
                },
            },
            lastUpdated: "2026-01-01T00:00:00.000Z",
        }), "utf-8");

        const store = new FileStateStore(statePath);

        expect((await store.get("octo/widgets"))?.baselineEstablished).toBe(true);
        expect((await store.get("octo/fresh"))?.baselineEstablished).toBe(false);
    });

    it("writes through a temporary file", async () => {
        const store = new FileStateStore(statePath);
        await store.subscribe("100", "octo/widgets");

        expect(fs.existsSync(statePath)).toBe(true);
        expect(fs.existsSync(`${statePath}.tmp`)).toBe(false);

        const saved: unknown = JSON.parse(fs.readFileSync(statePath, "utf-8"));
        expect(saved).toMatchObject({ subscriptions: [{ subscriberId: "100", repositoryId: "octo/widgets" }] });
    });

    it("starts empty when the file does not exist", async () => {
        const store = new FileStateStore(statePath);

        expect(await store.allActiveRepositories()).toEqual([]);
        expect(fs.existsSync(statePath)).toBe(false);
    });

    it("refuses to start from a corrupt file", () => {
        fs.writeFileSync(statePath, "{not json", "utf-8");
        expect(() => new FileStateStore(statePath)).toThrow(StorageError);

        fs.writeFileSync(statePath, JSON.stringify({ repos: [] }), "utf-8");
        expect(() => new FileStateStore(statePath)).toThrow(StorageError);
    });

    it("leaves the state unchanged when a write fails", async () => {
        const blocker = path.join(dir, "blocker");
        fs.writeFileSync(blocker, "", "utf-8");
        const store = new FileStateStore(path.join(blocker, "state.json"));

        await expect(store.subscribe("100", "octo/widgets")).rejects.toThrow(StorageError);
        await expect(store.compareAndSet("octo/widgets", null, cursorA)).rejects.toThrow(StorageError);

        expect(await store.subscribersOf("octo/widgets")).toEqual([]);
        expect(await store.get("octo/widgets")).toBeNull();
    });

    it("reports a writable directory as healthy", async () => {
        expect(await new FileStateStore(statePath).healthCheck()).toBe(true);
    });
});

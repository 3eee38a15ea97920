import dotenv from "dotenv";
dotenv.config();

import type { Server } from "http";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createApp, printBanner } from "./server/app.js";
import { GitHubRepositoryClient } from "./monitor/github/githubRepositoryClient.js";
import { CommandService } from "./monitor/services/commandService.js";
import { FailurePolicy } from "./monitor/services/failurePolicy.js";
import { NotificationDispatcher } from "./monitor/services/notificationDispatcher.js";
import { PollingScheduler } from "./monitor/services/pollingScheduler.js";
import { RepositoryChecker } from "./monitor/services/repositoryChecker.js";
import { RuntimeStats } from "./monitor/services/runtimeStats.js";
import { FileStateStore } from "./monitor/storage/fileStateStore.js";
import { MemoryStateStore } from "./monitor/storage/memoryStateStore.js";
import { ensureTablesExist } from "./monitor/storage/supabaseMigration.js";
import { SupabaseStateStore } from "./monitor/storage/supabaseStateStore.js";
import type { StateStore } from "./monitor/storage/types.js";
import { ConsoleChatTransport, type ChatTransport } from "./monitor/transport/chatTransport.js";
import { WebhookChatTransport } from "./monitor/transport/webhookChatTransport.js";
import { loadConfig, type AppConfig } from "./shared/config/env.js";
import { errorMessage } from "./shared/errors.js";

async function createStore(config: AppConfig): Promise<{ store: StateStore; supabase: SupabaseClient | null }> {
    switch (config.storage.backend) {
        case "supabase": {
            const store = new SupabaseStateStore(config.storage.supabaseUrl, config.storage.supabaseKey);
            const ready = await ensureTablesExist(store.getClient());
            if (!ready) {
                console.warn("⚠️  Supabase tables are missing. GET /api/migration/schema 로 스키마를 확인하세요.");
            }
            return { store, supabase: store.getClient() };
        }
        case "memory":
            console.warn("⚠️  STORAGE_BACKEND=memory: 재시작 시 구독과 cursor가 사라집니다.");
            return { store: new MemoryStateStore(), supabase: null };
        case "file":
            return { store: new FileStateStore(config.storage.statePath), supabase: null };
    }
}

function createTransport(config: AppConfig): ChatTransport {
    if (config.transportWebhookUrl) {
        console.log(`📡 Delivering notifications to ${config.transportWebhookUrl}`);
        return new WebhookChatTransport({
            url: config.transportWebhookUrl,
            token: config.botToken,
            timeoutMs: config.githubTimeoutMs,
        });
    }
    console.log("📡 TRANSPORT_WEBHOOK_URL not set, printing notifications to the console");
    return new ConsoleChatTransport();
}

async function main() {
    console.log("🚀 Commit Watch Started");

    const config = loadConfig();
    const { store, supabase } = await createStore(config);

    const client = new GitHubRepositoryClient({
        token: config.githubToken,
        timeoutMs: config.githubTimeoutMs,
    });

    // 자격 증명이 거부되면 폴링을 시작하지 않음
    const login = await client.verifyCredentials();
    console.log(`✅ GitHub authenticated as ${login}`);

    const stats = new RuntimeStats();
    const dispatcher = new NotificationDispatcher(createTransport(config), stats, {
        maxCommitsPerDelivery: config.maxCommitsPerDelivery,
        adminIds: config.adminIds,
    });
    const checker = new RepositoryChecker({
        store,
        subscriptions: store,
        client,
        dispatcher,
        policy: new FailurePolicy({ unreachableThreshold: config.unreachableThreshold }),
        stats,
    });

    let server: Server | null = null;
    const intervalMs = config.checkIntervalSeconds * 1000;
    const scheduler = new PollingScheduler(store, checker, {
        intervalMs,
        // 한 cycle은 여러 번의 GitHub 요청으로 구성됨
        cycleTimeoutMs: Math.max(intervalMs, config.githubTimeoutMs * 4),
        onFatal: detail => {
            console.error(`🛑 Polling halted: ${detail}`);
            process.exitCode = 1;
            server?.close();
        },
    });

    const commands = new CommandService({
        store,
        subscriptions: store,
        client,
        scheduler,
        stats,
        checkIntervalSeconds: config.checkIntervalSeconds,
    });

    const app = createApp({ commands, store, client, scheduler, adminIds: config.adminIds, supabase });
    server = app.listen(config.apiPort, () => printBanner(config.apiPort));

    scheduler.start();

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`\n👋 ${signal} received, shutting down...`);

        await scheduler.stop();
        server?.close();
        console.log("✅ Shutdown complete");
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.on(signal, () => {
            shutdown(signal).catch(error => {
                console.error("❌ Shutdown failed:", errorMessage(error));
                process.exit(1);
            });
        });
    }
}

main().catch(error => {
    console.error("❌ Fatal error:", errorMessage(error));
    process.exit(1);
});

/**
 * Express API 서버
 * 채팅 전송 계층의 명령 수신, 헬스체크, 스키마 안내
 */
import express, { type Express } from 'express';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { RepositoryClient } from '../monitor/github/repositoryClient.js';
import type { CommandService } from '../monitor/services/commandService.js';
import type { PollingScheduler } from '../monitor/services/pollingScheduler.js';
import type { StateStore } from '../monitor/storage/types.js';
import { createHealthRouter } from './routes/health.js';
import { createMigrationRouter } from './routes/migration.js';
import { createSubscriptionsRouter } from './routes/subscriptions.js';

export interface AppDeps {
    commands: CommandService;
    store: StateStore;
    client: RepositoryClient;
    scheduler: PollingScheduler;
    adminIds: readonly string[];
    supabase?: SupabaseClient | null;
    /** 요청 로깅 (테스트에서 끔) */
    logRequests?: boolean;
}

export function createApp(deps: AppDeps): Express {
    const app: Express = express();

    app.use(express.json());

    // 요청 로깅
    if (deps.logRequests ?? true) {
        app.use((req, _res, next) => {
            console.log(`📨 ${req.method} ${req.path}`);
            next();
        });
    }

    // 라우터 등록
    app.use('/api/health', createHealthRouter(deps));
    app.use('/api/subscribers', createSubscriptionsRouter(deps.commands, deps.adminIds));
    app.use('/api/migration', createMigrationRouter(deps.supabase ?? null));

    // 404 핸들러
    app.use((_req, res) => {
        res.status(404).json({ error: 'Not Found' });
    });

    // 에러 핸들러 (잘못된 JSON body 등)
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
        console.error('❌ 서버 오류:', err.message);
        res.status(status).json({ error: status === 500 ? 'Internal Server Error' : 'Bad Request', message: err.message });
    });

    return app;
}

export function printBanner(port: number): void {
    console.log(`
🚀 API Server is running!
━━━━━━━━━━━━━━━━━━━━━━━━━━━
📍 URL: http://localhost:${port}
📋 Endpoints:
   GET    /api/health                                        - 상태 확인
   POST   /api/subscribers/:id/repositories                  - 구독 추가
   DELETE /api/subscribers/:id/repositories/:owner/:name     - 구독 삭제
   GET    /api/subscribers/:id/repositories                  - 구독 목록
   POST   /api/subscribers/:id/checks                        - 즉시 확인
   GET    /api/subscribers/:id/stats                         - 통계
   GET    /api/migration/schema                              - 테이블 스키마
━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
}

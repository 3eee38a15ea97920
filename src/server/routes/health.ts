/**
 * 헬스체크 라우터
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import type { RepositoryClient } from '../../monitor/github/repositoryClient.js';
import type { PollingScheduler } from '../../monitor/services/pollingScheduler.js';
import type { StateStore } from '../../monitor/storage/types.js';
import { errorMessage } from '../../shared/errors.js';

const CACHE_TTL = 1000 * 60; // 1분 캐시

export interface HealthDeps {
    store: StateStore;
    client: RepositoryClient;
    scheduler: PollingScheduler;
    clock?: () => number;
}

export function createHealthRouter({ store, client, scheduler, clock = Date.now }: HealthDeps): IRouter {
    const router: IRouter = Router();

    // GitHub 자격 증명 확인 결과 캐시
    let githubCache: {
        login: string | null;
        error: string | null;
        timestamp: number;
    } | null = null;

    async function checkGitHub(): Promise<{ login: string | null; error: string | null }> {
        const now = clock();
        if (githubCache && (now - githubCache.timestamp) < CACHE_TTL) {
            return githubCache;
        }

        try {
            const login = await client.verifyCredentials();
            githubCache = { login, error: null, timestamp: now };
        } catch (error) {
            githubCache = { login: null, error: errorMessage(error), timestamp: now };
        }
        return githubCache;
    }

    /**
     * GET /api/health
     * 서버, 저장소, GitHub 연결 상태 (/status 명령)
     */
    router.get('/', async (_req: Request, res: Response) => {
        const [storageHealthy, github] = await Promise.all([
            store.healthCheck().catch((error: unknown) => {
                console.error('❌ Storage health check failed:', errorMessage(error));
                return false;
            }),
            checkGitHub(),
        ]);

        const halted = scheduler.isHalted();
        const ok = storageHealthy && github.login !== null && !halted;

        res.status(ok ? 200 : 503).json({
            status: ok ? 'ok' : 'degraded',
            timestamp: new Date(clock()).toISOString(),
            services: {
                api: 'online',
                storage: storageHealthy ? 'connected' : 'disconnected',
                github: github.login ? 'connected' : 'disconnected',
                scheduler: halted ? 'halted' : 'running',
            },
            githubLogin: github.login,
            ...(github.error ? { githubError: github.error } : {}),
        });
    });

    return router;
}

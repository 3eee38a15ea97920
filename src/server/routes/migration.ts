/**
 * 마이그레이션 라우터
 * Supabase 테이블 상태 확인 및 스키마 안내
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import type { SupabaseClient } from '@supabase/supabase-js';
import { getMigrationStatus, getSchemaSQL } from '../../monitor/storage/supabaseMigration.js';
import { handleError } from '../errorHandler.js';

export function createMigrationRouter(supabase: SupabaseClient | null): IRouter {
    const router: IRouter = Router();

    /**
     * GET /api/migration/status
     * 테이블 존재 여부 확인
     */
    router.get('/status', async (_req: Request, res: Response) => {
        if (!supabase) {
            res.status(404).json({ error: 'Supabase storage is not configured', message: 'STORAGE_BACKEND is not supabase' });
            return;
        }

        try {
            res.json(await getMigrationStatus(supabase));
        } catch (error) {
            handleError(res, error, '마이그레이션 상태 확인 중 오류가 발생했습니다.');
        }
    });

    /**
     * GET /api/migration/schema
     * 테이블 스키마 SQL 반환
     */
    router.get('/schema', (_req: Request, res: Response) => {
        try {
            const schema = getSchemaSQL();
            res.setHeader('Content-Type', 'text/plain; charset=utf-8');
            res.send(schema);
        } catch (error) {
            handleError(res, error, '스키마 조회 중 오류가 발생했습니다.');
        }
    });

    return router;
}

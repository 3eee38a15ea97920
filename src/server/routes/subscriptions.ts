/**
 * 구독 명령 라우터
 * 채팅 전송 계층이 받은 명령(/add, /remove, /list, /check, /stats)을 전달하는 경계입니다.
 */
import { Router, type NextFunction, type Request, type Response, type IRouter } from 'express';
import type { CommandService } from '../../monitor/services/commandService.js';
import { handleError } from '../errorHandler.js';

export function createSubscriptionsRouter(commands: CommandService, adminIds: readonly string[]): IRouter {
    const router: IRouter = Router();

    // ADMIN_CHAT_IDS가 설정되어 있으면 목록에 있는 채팅만 명령 가능
    router.param('subscriberId', (_req: Request, res: Response, next: NextFunction, subscriberId: string) => {
        if (adminIds.length > 0 && !adminIds.includes(subscriberId)) {
            console.warn(`🚫 Rejected command from ${subscriberId}`);
            res.status(403).json({ error: 'Forbidden', message: `Chat ${subscriberId} is not allowed to use this bot` });
            return;
        }
        next();
    });

    /**
     * POST /api/subscribers/:subscriberId/repositories
     * body: { repository: "owner/name" 또는 GitHub URL }
     */
    router.post('/:subscriberId/repositories', async (req, res) => {
        const repository: unknown = req.body?.repository;
        if (typeof repository !== 'string' || repository.trim().length === 0) {
            res.status(400).json({ error: 'repository is required', message: 'Usage: { "repository": "owner/name" }' });
            return;
        }

        try {
            const result = await commands.add(req.params.subscriberId, repository);
            res.status(result.created ? 201 : 200).json(result);
        } catch (error) {
            handleError(res, error, '레포지토리 추가 중 오류가 발생했습니다.');
        }
    });

    /**
     * DELETE /api/subscribers/:subscriberId/repositories/:owner/:name
     */
    router.delete('/:subscriberId/repositories/:owner/:name', async (req, res) => {
        try {
            const { subscriberId, owner, name } = req.params;
            const result = await commands.remove(subscriberId, `${owner}/${name}`);
            res.json(result);
        } catch (error) {
            handleError(res, error, '레포지토리 삭제 중 오류가 발생했습니다.');
        }
    });

    router.get('/:subscriberId/repositories', async (req, res) => {
        try {
            const repositories = await commands.list(req.params.subscriberId);
            res.json({ repositories });
        } catch (error) {
            handleError(res, error, '구독 목록 조회 중 오류가 발생했습니다.');
        }
    });

    /**
     * POST /api/subscribers/:subscriberId/checks
     * 구독 중인 레포지토리 즉시 확인
     */
    router.post('/:subscriberId/checks', async (req, res) => {
        try {
            const results = await commands.check(req.params.subscriberId);
            res.json({ results });
        } catch (error) {
            handleError(res, error, '수동 확인 중 오류가 발생했습니다.');
        }
    });

    router.get('/:subscriberId/stats', async (req, res) => {
        try {
            res.json(await commands.stats(req.params.subscriberId));
        } catch (error) {
            handleError(res, error, '통계 조회 중 오류가 발생했습니다.');
        }
    });

    return router;
}

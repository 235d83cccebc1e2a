import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type {
    ConversationMessageDTO,
    ConversationTurnResponseDTO
} from '../../../../shared/api/index.js';
import type { ConversationService } from '../../services/conversation/conversation.service.js';
import type { Message } from '../../services/memory/memory.types.js';

/**
 * Request body validation schema
 */
const TurnRequestSchema = z.object({
    text: z.string().max(2000),
    threadId: z.string().trim().min(1).max(128).optional()
});

const ThreadParamsSchema = z.object({
    threadId: z.string().trim().min(1).max(128)
});

/**
 * Token from `Authorization: Bearer <token>`; a bare value is accepted too.
 */
export function parseAuthToken(header: string | undefined): string | undefined {
    if (!header) return undefined;
    const token = header.replace(/^Bearer\s+/i, '').trim();
    return token || undefined;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 does not await handlers; route rejections to the error middleware.
 */
function asyncRoute(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

function toMessageDTO(m: Message): ConversationMessageDTO {
    return { role: m.role, text: m.text, createdAt: m.createdAt.toISOString() };
}

export function createConversationRouter(service: ConversationService): Router {
    const router = Router();

    /**
     * POST /api/v1/conversation/turn
     * Body: { "text": "best italian in delhi", "threadId"?: "..." }
     * Header: Authorization: Bearer <token> (needed only to create collections)
     */
    router.post('/turn', asyncRoute(async (req: Request, res: Response) => {
        const parsed = TurnRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid request', details: parsed.error.flatten() });
            return;
        }

        // Client gone before the reply: cancel the turn so nothing is written
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableEnded) controller.abort();
        });

        const result = await service.handleTurn({
            text: parsed.data.text,
            threadId: parsed.data.threadId,
            authToken: parseAuthToken(req.header('authorization')),
            signal: controller.signal,
            traceId: req.traceId
        });

        const body: ConversationTurnResponseDTO = {
            threadId: result.threadId,
            intent: result.intent,
            message: result.message,
            restaurants: result.restaurants
        };
        if (result.error) body.error = result.error;
        if (result.collection) body.collection = result.collection;

        res.json(body);
    }));

    /**
     * GET /api/v1/conversation/:threadId/history
     */
    router.get('/:threadId/history', asyncRoute(async (req: Request, res: Response) => {
        const params = ThreadParamsSchema.safeParse(req.params);
        if (!params.success) {
            res.status(400).json({ error: 'Invalid thread id' });
            return;
        }
        const history = await service.getHistory(params.data.threadId);
        res.json({ threadId: params.data.threadId, messages: history.map(toMessageDTO) });
    }));

    /**
     * GET /api/v1/conversation/:threadId/stats
     */
    router.get('/:threadId/stats', asyncRoute(async (req: Request, res: Response) => {
        const params = ThreadParamsSchema.safeParse(req.params);
        if (!params.success) {
            res.status(400).json({ error: 'Invalid thread id' });
            return;
        }
        const stats = await service.getStats(params.data.threadId);
        if (!stats) {
            res.status(404).json({ error: 'Thread not found', threadId: params.data.threadId });
            return;
        }
        res.json(stats);
    }));

    /**
     * DELETE /api/v1/conversation/:threadId
     * Clears history, cached results and preferences; the thread id stays valid.
     */
    router.delete('/:threadId', asyncRoute(async (req: Request, res: Response) => {
        const params = ThreadParamsSchema.safeParse(req.params);
        if (!params.success) {
            res.status(400).json({ error: 'Invalid thread id' });
            return;
        }
        const cleared = await service.clearThread(params.data.threadId);
        if (!cleared) {
            res.status(404).json({ error: 'Thread not found', threadId: params.data.threadId });
            return;
        }
        res.json({ success: true, threadId: params.data.threadId });
    }));

    return router;
}

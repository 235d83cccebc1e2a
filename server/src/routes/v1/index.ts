/**
 * API v1 Router Aggregator
 *
 * Route Structure:
 * - /api/v1/conversation/turn               POST
 * - /api/v1/conversation/:threadId/history  GET
 * - /api/v1/conversation/:threadId/stats    GET
 * - /api/v1/conversation/:threadId          DELETE
 */

import { Router } from 'express';
import { createConversationRouter } from '../../controllers/conversation/conversation.controller.js';
import type { ConversationService } from '../../services/conversation/conversation.service.js';

export interface V1RouterDeps {
  conversationService: ConversationService;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();

  router.use('/conversation', createConversationRouter(deps.conversationService));

  return router;
}

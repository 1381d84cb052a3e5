import { RequestHandler, Router } from 'express';
import { AgentLoop } from '../../agent/agent-loop';
import { LanguageModel } from '../../llm/types';
import { validateChatMessages, validateQueryRequest } from '../../utils/schema-validator';
import { asyncHandler } from '../async-handler';

export function agentRoutes(agent: AgentLoop, model: LanguageModel, auth: RequestHandler): Router {
  const router = Router();

  router.post(
    '/query',
    auth,
    asyncHandler(async (req, res) => {
      const { question, max_steps } = validateQueryRequest(req.body);
      const result = await agent.run(question, max_steps);
      res.json({ ok: true, ...result });
    }),
  );

  // Raw model passthrough, used to check the model endpoint by hand
  router.post(
    '/llm_chat',
    auth,
    asyncHandler(async (req, res) => {
      const messages = validateChatMessages(req.body);
      res.json({ text: await model.generate(messages) });
    }),
  );

  return router;
}

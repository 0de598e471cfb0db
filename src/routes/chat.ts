import { Router } from 'express';
import { z } from 'zod';
import { DEFAULT_MODEL } from '../services/MemoryChatService.js';
import type { MemoryChatRegistry } from '../services/ServiceRegistry.js';
import { chatRequests, tokensConsumed } from '../metrics.js';

export const chatRequestSchema = z.object({
  message: z.string().min(1).max(5000),
  user_id: z.string().nullish(),
  namespace: z.string().min(1).nullish().transform((value) => value ?? 'default'),
  model: z.string().min(1).nullish().transform((value) => value ?? DEFAULT_MODEL),
  system_prompt: z.string().nullish()
});

export function buildChatRouter(registry: MemoryChatRegistry) {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const payload = chatRequestSchema.parse(req.body);

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      // Per-user isolation happens inside the call; the registry entry stays keyed by namespace.
      const service = registry.resolve(payload.namespace);
      const result = await service.chat({
        message: payload.message,
        userId: payload.user_id,
        model: payload.model,
        systemPrompt: payload.system_prompt,
        signal: controller.signal
      });

      if (!result.success) {
        chatRequests.inc({ outcome: 'failed' });
        return res.json({
          success: false,
          error: result.error,
          metadata: { namespace: result.namespace }
        });
      }

      chatRequests.inc({ outcome: 'success' });
      tokensConsumed.inc(result.usage.totalTokens);
      return res.json({
        success: true,
        response: result.response,
        metadata: {
          model: result.model,
          namespace: result.namespace,
          usage: {
            prompt_tokens: result.usage.promptTokens,
            completion_tokens: result.usage.completionTokens,
            total_tokens: result.usage.totalTokens
          }
        }
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Chat Route
 * Thin wrapper over the tool-calling loop: one user message in, one answer out
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { WeatherOrchestrator } from '../services/orchestrator/index.js';

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message is required').max(4000),
  conversation_id: z.string().optional(),
});

export interface ChatRouteOptions {
  orchestrator: Pick<WeatherOrchestrator, 'invoke'>;
}

export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (server, { orchestrator }) => {
  // POST /chat - answer a weather question
  server.post('/chat', async (request) => {
    const body = ChatRequestSchema.parse(request.body);

    // Abort the model/tool work when the client goes away before we reply
    const controller = new AbortController();
    const onClose = () => controller.abort(new Error('Client disconnected'));
    request.raw.socket?.once('close', onClose);

    try {
      const result = await orchestrator.invoke(body.message, { signal: controller.signal });

      request.log.info(
        { iterations: result.iterations, toolCalls: result.toolCalls.length, truncated: result.truncated },
        'Chat answered',
      );

      return {
        response: result.text,
        conversation_id: body.conversation_id ?? null,
        usage: {
          prompt_tokens: result.usage.promptTokens,
          completion_tokens: result.usage.completionTokens,
          total_tokens: result.usage.totalTokens,
        },
        iterations: result.iterations,
      };
    } finally {
      request.raw.socket?.removeListener('close', onClose);
    }
  });
};

// src/api/routes.ts
import type { FastifyInstance, FastifyReply } from 'fastify';
import { createScrapeHandlers, RequestError, type ScrapeHandlerConfig } from './scrape.js';
import type { ScrapePipeline } from '../processing/pipeline.js';
import type { ApiError } from '../types/index.js';

export type RouteConfig = ScrapeHandlerConfig;

function sendRequestError(reply: FastifyReply, error: RequestError): ApiError {
  const status = error.code === 'BATCH_TOO_LARGE' ? 413 : 400;
  reply.status(status);
  return {
    error: status === 413 ? 'Payload Too Large' : 'Bad Request',
    message: error.message,
    code: error.code,
  };
}

export function registerRoutes(
  app: FastifyInstance,
  pipeline: ScrapePipeline,
  config: RouteConfig
): void {
  const scrapeHandlers = createScrapeHandlers(pipeline, config);

  // Health check
  app.get('/health', async () => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
  });

  // Scrape failures are still 200: the record's error field carries them
  app.post('/scrape', async (request, reply) => {
    try {
      return await scrapeHandlers.scrapeOne(request.body);
    } catch (error) {
      if (error instanceof RequestError) {
        return sendRequestError(reply, error);
      }
      throw error;
    }
  });

  app.post('/scrape/batch', async (request, reply) => {
    try {
      const articles = await scrapeHandlers.scrapeBatch(request.body);
      return { articles };
    } catch (error) {
      if (error instanceof RequestError) {
        return sendRequestError(reply, error);
      }
      throw error;
    }
  });
}

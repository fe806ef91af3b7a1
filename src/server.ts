// src/server.ts
import Fastify from 'fastify';
import cors from '@fastify/cors';

import { config } from './config.js';
import { createScraper } from './index.js';
import { registerRoutes } from './api/routes.js';

async function main() {
  if (!config.openaiApiKey && !config.anthropicApiKey) {
    console.log('No LLM API key configured; every scrape will report a rewrite error');
  }

  const pipeline = createScraper(config);

  // Initialize Fastify
  const app = Fastify({ logger: true });
  await app.register(cors);

  registerRoutes(app, pipeline, {
    defaultModel: { provider: config.llmProvider, model: config.llmModel },
    maxBatchSize: config.maxBatchSize,
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, starting graceful shutdown...`);

    try {
      await app.close();
      console.log('HTTP server closed');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  console.log(`Server running on port ${config.port}`);
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

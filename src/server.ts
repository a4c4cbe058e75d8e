/**
 * Entry point: build the master table, then start the HTTP API
 */

import { basename } from 'path';
import { createApp } from './api.js';
import { loadConfig } from './config.js';
import { MasterTableStore } from './master-table.js';
import { GeminiBackend } from './tools/model-backend.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const store = new MasterTableStore(config.sources);
  const state = await store.load();

  const backend = config.apiKey
    ? new GeminiBackend({
        apiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
        timeoutMs: config.modelTimeoutMs,
        retry: config.retry,
      })
    : null;
  if (!backend) {
    console.warn('⚠️ GEMINI_API_KEY is not set; questions will be rejected until it is configured.');
  }

  const app = createApp({
    store,
    backend,
    sources: [config.sources.crop, config.sources.rainfall, config.sources.soil].map(path => basename(path)),
  });

  app.listen(config.port, () => {
    if (state.status === 'ready') {
      console.log(`\n🚀 Agri-climate Q&A API running on http://localhost:${config.port}`);
    } else {
      console.error('\n--- Master table could not be built; questions are rejected until POST /reload succeeds ---');
      console.log(`API listening on http://localhost:${config.port}`);
    }
    console.log(`🤖 Using model: ${config.model}`);
  });
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import {
  loadConfig,
  createImageBackend,
  SessionStore,
  MessageLifecycleManager,
  VariationTokenGenerator,
  GenerationCoordinator,
} from '@pixscript/core';
import { TelegramAdapter } from '@pixscript/channels';

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootDir = resolve(__dirname, '..', '..', '..');

// Load .env from project root
loadEnv({ path: resolve(rootDir, '.env') });

async function main() {
  console.log('[Pixscript] Starting...');

  // 1. Load config
  const configPath = process.env.PIXSCRIPT_CONFIG ?? resolve(rootDir, 'pixscript.config.json5');
  const config = await loadConfig(configPath);
  console.log(`[Pixscript] Config loaded from ${configPath}`);

  // 2. Image backend
  const backend = createImageBackend(config.image);
  console.log(`[Pixscript] Image provider: ${backend.provider}`);

  // 3. Transport, sessions and the coordinator
  const telegram = new TelegramAdapter({ botToken: config.channels.telegram.botToken });
  const store = new SessionStore();
  const coordinator = new GenerationCoordinator({
    store,
    backend,
    transport: telegram,
    lifecycle: new MessageLifecycleManager(telegram),
    tokens: new VariationTokenGenerator({
      length: config.variation.tokenLength,
      maxAttempts: config.variation.maxAttempts,
    }),
    maxPromptLength: config.image.maxPromptLength,
    display: config.display,
  });

  telegram.onEvent(async (event) => {
    const result = await coordinator.handle(event);
    if (result.status === 'failed' && result.error.kind === 'unknown') {
      console.error(`[Pixscript] Unclassified failure in ${event.conversationId}: ${result.error.reason ?? 'no reason given'}`);
    }
  });

  // 4. Start
  await telegram.start();
  console.log('[Pixscript] Bot started...');

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Pixscript] Received ${signal}, shutting down...`);
    await telegram.stop();
    store.clear();
    console.log('[Pixscript] Bot stopped.');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => console.error('[Pixscript] Shutdown failed:', err));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => console.error('[Pixscript] Shutdown failed:', err));
  });
}

main().catch((err) => {
  console.error('[Pixscript] Fatal error:', err);
  process.exit(1);
});

import { ConfigError } from '../errors/errors.js';
import type { ImageConfig } from '../config/schema.js';
import { GeminiImageBackend } from './gemini.js';
import { OpenAIImageBackend } from './openai.js';
import type { ImageBackend, ImageProvider } from './types.js';

const DEFAULT_MODELS: Record<ImageProvider, string> = {
  openai: 'gpt-image-1',
  gemini: 'gemini-2.5-flash-image',
};

const API_KEY_VARS: Record<ImageProvider, string> = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

type Env = Record<string, string | undefined>;

/**
 * Resolve which image provider to use: the preferred one when its key is
 * set, otherwise the first provider with a key.
 */
export function resolveImageProvider(preferred: ImageProvider | undefined, env: Env = process.env): ImageProvider | null {
  if (preferred && env[API_KEY_VARS[preferred]]) return preferred;
  if (env.OPENAI_API_KEY) return 'openai';
  if (env.GEMINI_API_KEY) return 'gemini';
  return null;
}

export function createImageBackend(config: ImageConfig, env: Env = process.env): ImageBackend {
  const provider = resolveImageProvider(config.provider, env);
  if (!provider) {
    throw new ConfigError('No image generation provider available. Set OPENAI_API_KEY or GEMINI_API_KEY.');
  }
  if (config.provider && provider !== config.provider) {
    console.warn(`[Config] ${API_KEY_VARS[config.provider]} is not set, falling back to ${provider}`);
  }

  const apiKey = env[API_KEY_VARS[provider]] ?? '';
  const model = config.model ?? DEFAULT_MODELS[provider];

  if (provider === 'openai') {
    return new OpenAIImageBackend({
      apiKey,
      model,
      size: config.size,
      quality: config.quality,
      timeoutMs: config.timeoutMs,
    });
  }
  return new GeminiImageBackend({ apiKey, model, timeoutMs: config.timeoutMs });
}

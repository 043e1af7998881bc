import { createHash } from 'node:crypto';
import type { ImageBackend, ImageResult } from './types.js';

export interface GeminiImageOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/** Derive a stable 31-bit seed from the variation token. */
export function seedFromHint(hint: string): number | undefined {
  if (!hint) return undefined;
  return createHash('sha256').update(hint).digest().readUInt32BE(0) & 0x7fffffff;
}

function statusOf(err: unknown): number | undefined {
  if (err !== null && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export class GeminiImageBackend implements ImageBackend {
  readonly provider = 'gemini' as const;

  constructor(private options: GeminiImageOptions) {}

  async generate(prompt: string, variationHint: string): Promise<ImageResult> {
    try {
      const { GoogleGenAI } = await import('@google/genai');
      const client = new GoogleGenAI({ apiKey: this.options.apiKey });

      const response = await client.models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: {
          responseModalities: ['TEXT', 'IMAGE'],
          seed: seedFromHint(variationHint),
          httpOptions: { timeout: this.options.timeoutMs },
        },
      });

      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        return { success: false, error: `Prompt blocked by Gemini: ${blockReason}`, provider: this.provider };
      }

      const candidate = response.candidates?.[0];
      for (const part of candidate?.content?.parts ?? []) {
        if (part.inlineData?.data) {
          return {
            success: true,
            imageBuffer: Buffer.from(part.inlineData.data, 'base64'),
            mimeType: part.inlineData.mimeType ?? 'image/png',
            provider: this.provider,
          };
        }
      }

      const finishReason = candidate?.finishReason ? String(candidate.finishReason) : undefined;
      if (finishReason && finishReason !== 'STOP') {
        return { success: false, error: `Image blocked by Gemini: ${finishReason}`, provider: this.provider };
      }
      return { success: false, error: 'No image data in Gemini response', provider: this.provider };
    } catch (err) {
      return {
        success: false,
        error: `Gemini error: ${err instanceof Error ? err.message : String(err)}`,
        status: statusOf(err),
        provider: this.provider,
      };
    }
  }
}

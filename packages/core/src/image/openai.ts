import type { ImageBackend, ImageResult } from './types.js';

export const OPENAI_IMAGES_URL = 'https://api.openai.com/v1/images/generations';

export interface OpenAIImageOptions {
  apiKey: string;
  model: string;
  size: string;
  quality: string;
  timeoutMs: number;
}

interface OpenAIImagesResponse {
  data?: Array<{ b64_json?: string; url?: string }>;
}

export class OpenAIImageBackend implements ImageBackend {
  readonly provider = 'openai' as const;

  constructor(private options: OpenAIImageOptions) {}

  async generate(prompt: string, _variationHint: string): Promise<ImageResult> {
    const { apiKey, model, size, quality, timeoutMs } = this.options;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(OPENAI_IMAGES_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model, prompt, size, quality, n: 1 }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        return {
          success: false,
          error: `OpenAI Images API error: ${response.status} ${extractErrorMessage(body)}`,
          status: response.status,
          provider: this.provider,
        };
      }

      const json = (await response.json()) as OpenAIImagesResponse;
      const item = json.data?.[0];

      let imageBuffer: Buffer | undefined;
      if (item?.b64_json) {
        imageBuffer = Buffer.from(item.b64_json, 'base64');
      } else if (item?.url) {
        const imgResponse = await fetch(item.url, { signal: controller.signal });
        if (!imgResponse.ok) {
          return {
            success: false,
            error: `Failed to download generated image: ${imgResponse.status}`,
            status: imgResponse.status,
            provider: this.provider,
          };
        }
        imageBuffer = Buffer.from(await imgResponse.arrayBuffer());
      }

      if (!imageBuffer) {
        return { success: false, error: 'OpenAI did not return URL or b64 image data.', provider: this.provider };
      }

      return { success: true, imageBuffer, mimeType: 'image/png', provider: this.provider };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return { success: false, error: 'Image generation request timed out', provider: this.provider };
      }
      return {
        success: false,
        error: `OpenAI error: ${err instanceof Error ? err.message : String(err)}`,
        provider: this.provider,
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Pull `error.message` out of an OpenAI error body, falling back to the raw text. */
export function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'error' in parsed &&
      parsed.error !== null &&
      typeof parsed.error === 'object' &&
      'message' in parsed.error &&
      typeof parsed.error.message === 'string'
    ) {
      return parsed.error.message;
    }
    return body.trim();
  } catch {
    return body.trim();
  }
}

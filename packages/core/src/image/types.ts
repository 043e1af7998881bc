export const IMAGE_PROVIDERS = ['openai', 'gemini'] as const;

export type ImageProvider = (typeof IMAGE_PROVIDERS)[number];

export interface ImageSuccess {
  success: true;
  imageBuffer: Buffer;
  mimeType: string;
  provider: ImageProvider;
}

export interface ImageFailure {
  success: false;
  error: string;
  /** HTTP status from the provider, when there was one. */
  status?: number;
  provider?: ImageProvider;
}

export type ImageResult = ImageSuccess | ImageFailure;

export interface ImageBackend {
  readonly provider: ImageProvider;
  /**
   * `prompt` already carries the variation token; `variationHint` is the same
   * token for backends that also take an out-of-band seed.
   */
  generate(prompt: string, variationHint: string): Promise<ImageResult>;
}

import { z } from "zod";
import { IMAGE_PROVIDERS } from "../image/types.js";

// ── Channels ─────────────────────────────────────────────────────────
export const ChannelsConfigSchema = z.object({
  telegram: z.object({ botToken: z.string() }),
});

export type ChannelsConfig = z.infer<typeof ChannelsConfigSchema>;

// ── Image generation ─────────────────────────────────────────────────
export const ImageConfigSchema = z.object({
  provider: z.enum(IMAGE_PROVIDERS).optional(),
  /** Defaults per provider when omitted. */
  model: z.string().optional(),
  size: z.string().default("1024x1024"),
  quality: z.string().default("auto"),
  timeoutMs: z.number().int().positive().default(60_000),
  maxPromptLength: z.number().int().positive().default(4000),
});

export type ImageConfig = z.infer<typeof ImageConfigSchema>;

// ── Variation tokens ─────────────────────────────────────────────────
export const VariationConfigSchema = z.object({
  tokenLength: z.number().int().min(1).max(64).default(8),
  maxAttempts: z.number().int().min(1).default(5),
});

export type VariationConfig = z.infer<typeof VariationConfigSchema>;

// ── Display ──────────────────────────────────────────────────────────
export const DisplayConfigSchema = z.object({
  /** Caption images with the script that produced them. */
  caption: z.boolean().default(false),
  downloadButton: z.boolean().default(true),
});

export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;

// ── Root config ──────────────────────────────────────────────────────
export const PixscriptConfigSchema = z.object({
  channels: ChannelsConfigSchema,
  image: ImageConfigSchema.default({}),
  variation: VariationConfigSchema.default({}),
  display: DisplayConfigSchema.default({}),
});

export type PixscriptConfig = z.infer<typeof PixscriptConfigSchema>;

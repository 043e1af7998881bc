import type { OutboundImage, TransportRef } from '@pixscript/channels';
import type { ClassifiedError } from '../errors/classifier.js';
import type { Language } from '../language/detector.js';

/** Built for one coordinator invocation and never stored. */
export interface GenerationRequest {
  script: string;
  language: Language;
  /** Empty for the first attempt at a script. */
  variationToken: string;
  isRegeneration: boolean;
}

export type GenerationOutcome =
  | { status: 'success'; image: OutboundImage }
  | { status: 'failure'; cause: unknown; language: Language };

export type HandleResult =
  | { status: 'greeted' }
  | { status: 'displayed'; ref: TransportRef }
  | { status: 'failed'; error: ClassifiedError; ref?: TransportRef }
  | { status: 'superseded' }
  | { status: 'downloaded'; ref: TransportRef }
  | { status: 'ignored' };

/** The prompt the backend sees: the script with its invisible variation token. */
export function buildPrompt(request: GenerationRequest): string {
  return request.script + request.variationToken;
}

/** Counts code points, so an emoji is never split at the cut. */
export function createImageCaption(script: string, maxLength = 100): string {
  const chars = Array.from(script);
  return chars.length > maxLength ? `${chars.slice(0, maxLength - 3).join('')}...` : script;
}

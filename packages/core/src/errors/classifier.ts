import type { Language } from '../language/detector.js';
import { GenerationError, InvalidScriptError, type InvalidScriptReason } from './errors.js';
import type { ErrorKind } from './kinds.js';
import { ERROR_HEADLINES, INVALID_SCRIPT_DETAILS, REASON_LABELS } from './messages.js';

export interface ClassifiedError {
  kind: ErrorKind;
  /** Underlying reason text, verbatim. */
  reason?: string;
  invalidScript?: InvalidScriptReason;
}

const REJECTED_PATTERNS = ['content policy', 'content_policy', 'safety', 'moderation', 'blocked', 'prohibited'];
const QUOTA_PATTERNS = ['quota', 'billing', 'insufficient', 'api key', 'api_key', 'unauthorized', 'rate limit', 'rate_limit', 'too many requests'];
const UNAVAILABLE_PATTERNS = [
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'fetch failed',
  'network',
  'unavailable',
  'aborted',
];

function reasonOf(raw: unknown): string | undefined {
  if (raw instanceof Error) return raw.message || undefined;
  if (typeof raw === 'string') return raw || undefined;
  if (raw !== null && typeof raw === 'object' && 'error' in raw && typeof raw.error === 'string') {
    return raw.error || undefined;
  }
  return undefined;
}

function statusOf(raw: unknown): number | undefined {
  if (raw === null || typeof raw !== 'object') return undefined;
  if ('status' in raw && typeof raw.status === 'number') return raw.status;
  if ('statusCode' in raw && typeof raw.statusCode === 'number') return raw.statusCode;
  return undefined;
}

function matches(message: string, patterns: string[]): boolean {
  return patterns.some((pattern) => message.includes(pattern));
}

/**
 * Map a thrown error or a backend failure to the error taxonomy, keeping the
 * raw message as the reason.
 */
export function classifyError(raw: unknown): ClassifiedError {
  if (raw instanceof InvalidScriptError) {
    return { kind: 'invalid_script', invalidScript: raw.reason };
  }

  const reason = reasonOf(raw);

  if (raw instanceof GenerationError && raw.kind) {
    return { kind: raw.kind, reason };
  }

  const message = (reason ?? '').toLowerCase();
  const status = statusOf(raw);

  if (matches(message, REJECTED_PATTERNS)) {
    return { kind: 'backend_rejected', reason };
  }

  if (status === 401 || status === 402 || status === 403 || status === 429 || matches(message, QUOTA_PATTERNS)) {
    return { kind: 'backend_quota_exceeded', reason };
  }

  if (status === 408 || (status !== undefined && status >= 500) || matches(message, UNAVAILABLE_PATTERNS)) {
    return { kind: 'backend_unavailable', reason };
  }

  return { kind: 'unknown', reason };
}

export function renderErrorMessage(error: ClassifiedError, language: Language): string {
  const lines = [ERROR_HEADLINES[error.kind][language]];
  if (error.invalidScript) {
    lines.push(INVALID_SCRIPT_DETAILS[error.invalidScript][language]);
  } else if (error.reason) {
    lines.push(`${REASON_LABELS[language]}: ${error.reason}`);
  }
  return lines.join('\n');
}

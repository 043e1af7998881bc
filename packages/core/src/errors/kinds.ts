export const ERROR_KINDS = [
  'invalid_script',
  'backend_rejected',
  'backend_unavailable',
  'backend_quota_exceeded',
  'unknown',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

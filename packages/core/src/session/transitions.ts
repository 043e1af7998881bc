import { InvalidTransitionError } from '../errors/errors.js';
import type { Session, SessionState } from './types.js';

const ALLOWED: Record<SessionState, readonly SessionState[]> = {
  idle: ['awaiting_script', 'generating', 'failed'],
  awaiting_script: ['generating', 'failed'],
  // generating -> generating is a newer request superseding the one in flight
  generating: ['generating', 'displaying', 'failed'],
  displaying: ['generating', 'failed'],
  failed: ['generating', 'failed'],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return ALLOWED[from].includes(to);
}

export function transition(session: Session, to: SessionState): void {
  if (!canTransition(session.state, to)) {
    throw new InvalidTransitionError(session.state, to);
  }
  session.state = to;
  session.lastActiveAt = new Date();
}

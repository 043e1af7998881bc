import type { TransportRef, OutboundImage } from '@pixscript/channels';
import type { Language } from '../language/detector.js';

export const SESSION_STATES = ['idle', 'awaiting_script', 'generating', 'displaying', 'failed'] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export interface DisplayedArtifact {
  ref: TransportRef;
  kind: 'image' | 'error';
}

export interface Session {
  conversationId: string;
  /** Unset until the first script arrives. */
  language?: Language;
  lastScript?: string;
  /** Tokens already used for the current script. */
  variationHistory: Set<string>;
  variationCounter: number;
  displayedArtifact?: DisplayedArtifact;
  /** The image behind `displayedArtifact` while displaying, for the download action. */
  lastImage?: OutboundImage;
  state: SessionState;
  /** Bumped on every new attempt; a commit carrying an older id is superseded. */
  generationId: number;
  senderDisplayName?: string;
  createdAt: Date;
  lastActiveAt: Date;
}

export function createSession(conversationId: string, now = new Date()): Session {
  return {
    conversationId,
    variationHistory: new Set(),
    variationCounter: 0,
    state: 'idle',
    generationId: 0,
    createdAt: now,
    lastActiveAt: now,
  };
}

export function cloneSession(session: Session): Session {
  return {
    ...session,
    variationHistory: new Set(session.variationHistory),
    displayedArtifact: session.displayedArtifact ? { ...session.displayedArtifact } : undefined,
  };
}

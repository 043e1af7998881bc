import type { ChatTransport } from '@pixscript/channels';
import type { DisplayedArtifact, Session } from '../session/types.js';

/**
 * Keeps at most one visible artifact (image or error) per conversation.
 * `detach` and `record` only touch the session, so call them inside a
 * `SessionStore.update`; `retract` talks to the transport.
 */
export class MessageLifecycleManager {
  constructor(private transport: ChatTransport) {}

  /** Clear the session's displayed artifact, returning it for retraction. */
  detach(session: Session): DisplayedArtifact | undefined {
    const artifact = session.displayedArtifact;
    session.displayedArtifact = undefined;
    session.lastImage = undefined;
    return artifact;
  }

  /** Best-effort delete; failures are logged and never reach the caller. */
  async retract(conversationId: string, artifact: DisplayedArtifact): Promise<boolean> {
    try {
      const deleted = await this.transport.deleteMessage(conversationId, artifact.ref);
      if (!deleted) {
        console.warn(`[Lifecycle] Could not delete ${artifact.kind} message ${artifact.ref} in ${conversationId}`);
      }
      return deleted;
    } catch (err) {
      console.warn(
        `[Lifecycle] Could not delete ${artifact.kind} message ${artifact.ref} in ${conversationId}:`,
        err instanceof Error ? err.message : err,
      );
      return false;
    }
  }

  record(session: Session, artifact: DisplayedArtifact): void {
    session.displayedArtifact = artifact;
  }
}

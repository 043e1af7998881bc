import type { ChatTransport, InboundEvent, TransportRef } from '@pixscript/channels';
import { classifyError, renderErrorMessage } from '../errors/classifier.js';
import { GenerationError, InvalidScriptError, type InvalidScriptReason } from '../errors/errors.js';
import { formatTemplate, GREETINGS } from '../errors/messages.js';
import type { ImageBackend } from '../image/types.js';
import { DEFAULT_LANGUAGE, detectLanguage, type Language } from '../language/detector.js';
import { MessageLifecycleManager } from '../lifecycle/message-lifecycle.js';
import type { SessionStore } from '../session/store.js';
import { transition } from '../session/transitions.js';
import type { DisplayedArtifact, Session } from '../session/types.js';
import { VariationTokenGenerator } from '../variation/token-generator.js';
import {
  buildPrompt,
  createImageCaption,
  type GenerationOutcome,
  type GenerationRequest,
  type HandleResult,
} from './types.js';

export interface DisplayOptions {
  caption: boolean;
  downloadButton: boolean;
}

export interface GenerationCoordinatorOptions {
  store: SessionStore;
  backend: ImageBackend;
  transport: ChatTransport;
  lifecycle?: MessageLifecycleManager;
  tokens?: VariationTokenGenerator;
  maxPromptLength?: number;
  display?: DisplayOptions;
}

interface Attempt {
  generationId: number;
  /** Artifact detached from the session, still visible until retracted. */
  prior?: DisplayedArtifact;
}

type Plan =
  | (Attempt & { type: 'generate'; request: GenerationRequest })
  | (Attempt & { type: 'notice'; error: InvalidScriptError; language: Language });

const DEFAULT_MAX_PROMPT_LENGTH = 4000;

/**
 * Runs one generation attempt per inbound event. Session state is read and
 * committed under the store's per-conversation lock; the backend call happens
 * with the lock released, and a result that was overtaken by a newer request
 * in the meantime is dropped at commit.
 */
export class GenerationCoordinator {
  private store: SessionStore;
  private backend: ImageBackend;
  private transport: ChatTransport;
  private lifecycle: MessageLifecycleManager;
  private tokens: VariationTokenGenerator;
  private maxPromptLength: number;
  private display: DisplayOptions;

  constructor(options: GenerationCoordinatorOptions) {
    this.store = options.store;
    this.backend = options.backend;
    this.transport = options.transport;
    this.lifecycle = options.lifecycle ?? new MessageLifecycleManager(options.transport);
    this.tokens = options.tokens ?? new VariationTokenGenerator();
    this.maxPromptLength = options.maxPromptLength ?? DEFAULT_MAX_PROMPT_LENGTH;
    this.display = options.display ?? { caption: false, downloadButton: true };
  }

  async handle(event: InboundEvent): Promise<HandleResult> {
    switch (event.kind) {
      case 'command':
        return this.greet(event);
      case 'text': {
        const { text } = event;
        return this.run(event, (session) => this.planScript(session, text));
      }
      case 'action':
        if (event.action === 'download') return this.download(event.conversationId);
        return this.run(event, (session) => this.planRegeneration(session));
    }
  }

  private async run(event: InboundEvent, planner: (session: Session) => Plan): Promise<HandleResult> {
    const { conversationId } = event;
    const plan = await this.store.update(conversationId, (session) => {
      session.senderDisplayName = event.senderDisplayName;
      return planner(session);
    });

    // Retract before anything new can be recorded
    if (plan.prior) {
      await this.lifecycle.retract(conversationId, plan.prior);
    }

    if (plan.type === 'notice') {
      const outcome: GenerationOutcome = { status: 'failure', cause: plan.error, language: plan.language };
      return this.commit(conversationId, plan.generationId, outcome, plan.language);
    }

    const outcome = await this.generate(plan.request);
    return this.commit(conversationId, plan.generationId, outcome, plan.request.language, plan.request.script);
  }

  private planScript(session: Session, text: string): Plan {
    const script = text.trim();
    if (!script) {
      return this.planNotice(session, 'empty_script');
    }

    const language = detectLanguage(script, session.language);
    session.language = language;
    if (script.length > this.maxPromptLength) {
      return this.planNotice(session, 'script_too_long');
    }

    // Sending the same script again is a request for another take on it
    if (script === session.lastScript) {
      return this.planRegeneration(session);
    }

    session.lastScript = script;
    session.variationHistory.clear();
    return {
      type: 'generate',
      request: { script, language, variationToken: '', isRegeneration: false },
      ...this.begin(session),
    };
  }

  private planRegeneration(session: Session): Plan {
    if (!session.lastScript) {
      return this.planNotice(session, 'no_previous_script');
    }

    const language = session.language ?? DEFAULT_LANGUAGE;
    const variationToken = this.tokens.next(session);
    return {
      type: 'generate',
      request: { script: session.lastScript, language, variationToken, isRegeneration: true },
      ...this.begin(session),
    };
  }

  private planNotice(session: Session, reason: InvalidScriptReason): Plan {
    const attempt = this.begin(session, false);
    return {
      type: 'notice',
      error: new InvalidScriptError(reason),
      language: session.language ?? DEFAULT_LANGUAGE,
      ...attempt,
    };
  }

  private begin(session: Session, generating = true): Attempt {
    session.generationId += 1;
    const prior = this.lifecycle.detach(session);
    if (generating) {
      transition(session, 'generating');
    }
    return { generationId: session.generationId, prior };
  }

  private async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    try {
      const result = await this.backend.generate(buildPrompt(request), request.variationToken);
      if (result.success) {
        return { status: 'success', image: { data: result.imageBuffer, mimeType: result.mimeType } };
      }
      return { status: 'failure', cause: result, language: request.language };
    } catch (err) {
      return { status: 'failure', cause: err, language: request.language };
    }
  }

  private async commit(
    conversationId: string,
    generationId: number,
    outcome: GenerationOutcome,
    language: Language,
    script?: string,
  ): Promise<HandleResult> {
    return this.store.update(conversationId, async (session): Promise<HandleResult> => {
      if (session.generationId !== generationId) {
        console.log(
          `[Coordinator] Dropping superseded result for ${conversationId} (attempt ${generationId}, current ${session.generationId})`,
        );
        return { status: 'superseded' };
      }

      const stray = this.lifecycle.detach(session);
      if (stray) {
        await this.lifecycle.retract(conversationId, stray);
      }

      if (outcome.status === 'failure') {
        return this.showFailure(session, outcome.cause, outcome.language);
      }

      let ref: TransportRef;
      try {
        ref = await this.transport.sendImage(conversationId, outcome.image, {
          caption: this.display.caption && script ? createImageCaption(script) : '',
          downloadAffordance: this.display.downloadButton,
        });
      } catch (err) {
        console.error(`[Coordinator] Failed to send image to ${conversationId}:`, err);
        // Transport faults are not image-service faults; keep them out of the backend patterns
        const message = err instanceof Error ? err.message : String(err);
        return this.showFailure(session, new GenerationError(message, { kind: 'unknown', cause: err }), language);
      }

      this.lifecycle.record(session, { ref, kind: 'image' });
      session.lastImage = outcome.image;
      transition(session, 'displaying');
      return { status: 'displayed', ref };
    });
  }

  private async showFailure(session: Session, cause: unknown, language: Language): Promise<HandleResult> {
    const error = classifyError(cause);
    if (error.kind !== 'invalid_script') {
      console.warn(`[Coordinator] Generation failed for ${session.conversationId} (${error.kind}): ${error.reason ?? 'no reason given'}`);
    }
    transition(session, 'failed');

    try {
      const ref = await this.transport.sendText(session.conversationId, renderErrorMessage(error, language));
      this.lifecycle.record(session, { ref, kind: 'error' });
      return { status: 'failed', error, ref };
    } catch (err) {
      console.error(`[Coordinator] Failed to send error message to ${session.conversationId}:`, err);
      return { status: 'failed', error };
    }
  }

  private async greet(event: InboundEvent): Promise<HandleResult> {
    const { conversationId, senderDisplayName } = event;
    await this.store.update(conversationId, (session) => {
      session.senderDisplayName = senderDisplayName;
      if (session.state === 'idle') {
        transition(session, 'awaiting_script');
      }
    });

    try {
      await this.transport.sendText(conversationId, formatTemplate(GREETINGS.welcome, { name: senderDisplayName }));
      await this.transport.sendText(conversationId, GREETINGS.askForScript);
    } catch (err) {
      console.error(`[Coordinator] Failed to greet ${conversationId}:`, err);
    }
    return { status: 'greeted' };
  }

  private async download(conversationId: string): Promise<HandleResult> {
    const session = this.store.get(conversationId);
    if (!session || session.state !== 'displaying' || !session.lastImage) {
      return { status: 'ignored' };
    }

    const extension = session.lastImage.mimeType.includes('jpeg') ? 'jpg' : 'png';
    try {
      const ref = await this.transport.sendDocument(
        conversationId,
        session.lastImage,
        `pixscript-${session.generationId}.${extension}`,
      );
      return { status: 'downloaded', ref };
    } catch (err) {
      console.error(`[Coordinator] Failed to send download to ${conversationId}:`, err);
      return { status: 'ignored' };
    }
  }
}

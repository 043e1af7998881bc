import type { ChatTransport, OutboundImage, SendImageOptions, TransportRef } from '@pixscript/channels';
import type { ImageBackend, ImageProvider, ImageResult } from '../image/types.js';

export type TransportCall =
  | { method: 'sendImage'; conversationId: string; ref: TransportRef; image: OutboundImage; options: SendImageOptions }
  | { method: 'sendText'; conversationId: string; ref: TransportRef; text: string }
  | { method: 'sendDocument'; conversationId: string; ref: TransportRef; image: OutboundImage; fileName: string }
  | { method: 'deleteMessage'; conversationId: string; ref: TransportRef };

/** In-memory transport; refs are handed out as "1", "2", ... in send order. */
export class FakeTransport implements ChatTransport {
  calls: TransportCall[] = [];
  deleted: Array<{ conversationId: string; ref: TransportRef }> = [];
  deleteResult = true;
  deleteFailure?: Error;
  sendImageFailure?: Error;
  sendTextFailure?: Error;
  private nextRef = 1;

  async sendImage(conversationId: string, image: OutboundImage, options: SendImageOptions): Promise<TransportRef> {
    if (this.sendImageFailure) throw this.sendImageFailure;
    const ref = this.issueRef();
    this.calls.push({ method: 'sendImage', conversationId, ref, image, options });
    return ref;
  }

  async sendText(conversationId: string, text: string): Promise<TransportRef> {
    if (this.sendTextFailure) throw this.sendTextFailure;
    const ref = this.issueRef();
    this.calls.push({ method: 'sendText', conversationId, ref, text });
    return ref;
  }

  async sendDocument(conversationId: string, image: OutboundImage, fileName: string): Promise<TransportRef> {
    const ref = this.issueRef();
    this.calls.push({ method: 'sendDocument', conversationId, ref, image, fileName });
    return ref;
  }

  async deleteMessage(conversationId: string, ref: TransportRef): Promise<boolean> {
    this.calls.push({ method: 'deleteMessage', conversationId, ref });
    if (this.deleteFailure) throw this.deleteFailure;
    if (this.deleteResult) this.deleted.push({ conversationId, ref });
    return this.deleteResult;
  }

  texts(): string[] {
    return this.calls.flatMap((call) => (call.method === 'sendText' ? [call.text] : []));
  }

  private issueRef(): TransportRef {
    return String(this.nextRef++);
  }
}

export interface BackendCall {
  prompt: string;
  variationHint: string;
}

/**
 * Image backend that answers from a queue of scripted results. Without a
 * scripted result it succeeds with the bytes "image-<n>".
 */
export class FakeImageBackend implements ImageBackend {
  readonly provider: ImageProvider = 'openai';
  calls: BackendCall[] = [];
  private scripted: Array<ImageResult | Promise<ImageResult> | Error> = [];

  respondWith(...results: Array<ImageResult | Promise<ImageResult> | Error>): void {
    this.scripted.push(...results);
  }

  async generate(prompt: string, variationHint: string): Promise<ImageResult> {
    this.calls.push({ prompt, variationHint });
    const next = this.scripted.shift();
    if (next instanceof Error) throw next;
    if (next) return next;
    return {
      success: true,
      imageBuffer: Buffer.from(`image-${this.calls.length}`),
      mimeType: 'image/png',
      provider: this.provider,
    };
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

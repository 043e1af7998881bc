/** Transport-level handle of a sent message (Telegram message id as a string). */
export type TransportRef = string;

export type InboundAction = 'regenerate' | 'download';

export type InboundCommand = 'start';

export interface InboundEventBase {
  channelType: string;
  conversationId: string;
  senderId: string;
  senderDisplayName: string;
  timestamp: Date;
  raw?: unknown;
}

export type InboundEvent = InboundEventBase & (
  | { kind: 'text'; text: string }
  | { kind: 'action'; action: InboundAction }
  | { kind: 'command'; command: InboundCommand }
);

export interface OutboundImage {
  data: Buffer;
  mimeType: string;
}

export interface SendImageOptions {
  caption?: string;
  /** Attach a download button under the image. */
  downloadAffordance: boolean;
}

export interface ChatTransport {
  sendImage(conversationId: string, image: OutboundImage, options: SendImageOptions): Promise<TransportRef>;
  sendText(conversationId: string, text: string): Promise<TransportRef>;
  sendDocument(conversationId: string, image: OutboundImage, fileName: string): Promise<TransportRef>;
  /** Resolves false when the platform reports the message could not be deleted. */
  deleteMessage(conversationId: string, ref: TransportRef): Promise<boolean>;
}

export type InboundEventHandler = (event: InboundEvent) => Promise<void>;

export interface ChannelAdapter extends ChatTransport {
  type: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: InboundEventHandler): void;
}

import { Bot, InlineKeyboard, InputFile, type Context } from 'grammy';
import type {
  ChannelAdapter,
  InboundAction,
  InboundEvent,
  InboundEventBase,
  InboundEventHandler,
  OutboundImage,
  SendImageOptions,
  TransportRef,
} from '../types.js';

export interface TelegramAdapterConfig {
  botToken: string;
}

// Telegram has a 4096 char limit per message
export const TELEGRAM_MAX_TEXT_LENGTH = 4096;

const INBOUND_ACTIONS: readonly InboundAction[] = ['regenerate', 'download'];

const CALLBACK_DATA: Record<InboundAction, string> = {
  regenerate: 'regen',
  download: 'download',
};

/**
 * Inline keyboard shown under every generated image. "ENTIRE" and "GO" both
 * regenerate from the same script.
 */
export function buildImageKeyboard(downloadAffordance: boolean): InlineKeyboard {
  const keyboard = new InlineKeyboard()
    .text('ENTIRE', CALLBACK_DATA.regenerate)
    .row()
    .text('GO', CALLBACK_DATA.regenerate);
  if (downloadAffordance) {
    keyboard.row().text('⬇️ Download', CALLBACK_DATA.download);
  }
  return keyboard;
}

export function parseCallbackAction(data: string): InboundAction | null {
  return INBOUND_ACTIONS.find((action) => CALLBACK_DATA[action] === data) ?? null;
}

export function truncateForTelegram(text: string, maxLen = TELEGRAM_MAX_TEXT_LENGTH): string {
  if (text.length <= maxLen) return text;
  let end = maxLen - 1;
  // Don't leave half of a surrogate pair behind
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${text.slice(0, end)}…`;
}

function extensionFor(mimeType: string): string {
  if (mimeType.includes('jpeg') || mimeType.includes('jpg')) return 'jpg';
  if (mimeType.includes('webp')) return 'webp';
  return 'png';
}

export class TelegramAdapter implements ChannelAdapter {
  type = 'telegram' as const;
  private bot: Bot;
  private handlers: InboundEventHandler[] = [];

  constructor(config: TelegramAdapterConfig) {
    this.bot = new Bot(config.botToken);
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.bot.command('start', (ctx: Context) => {
      const base = this.eventBase(ctx);
      if (!base) return;
      this.dispatch({ ...base, kind: 'command', command: 'start' });
    });

    this.bot.on('message:text', (ctx) => {
      const text = ctx.message.text;
      // Unknown commands are not scripts
      if (text.startsWith('/')) return;
      const base = this.eventBase(ctx);
      if (!base) return;
      this.dispatch({ ...base, kind: 'text', text, raw: ctx.message });
    });

    this.bot.on('callback_query:data', async (ctx) => {
      await ctx.answerCallbackQuery();
      const action = parseCallbackAction(ctx.callbackQuery.data);
      const base = this.eventBase(ctx);
      if (!action || !base) return;
      this.dispatch({ ...base, kind: 'action', action, raw: ctx.callbackQuery });
    });

    this.bot.catch((err) => {
      console.error('[Telegram] Update handling failed:', err.error);
    });
  }

  private eventBase(ctx: Context): InboundEventBase | null {
    if (!ctx.chat || !ctx.from) return null;
    return {
      channelType: this.type,
      conversationId: String(ctx.chat.id),
      senderId: String(ctx.from.id),
      senderDisplayName: [ctx.from.first_name, ctx.from.last_name].filter(Boolean).join(' '),
      timestamp: new Date(),
    };
  }

  // Handlers run detached from grammy's update loop so that a slow
  // generation in one chat does not hold up polling for the others.
  private dispatch(event: InboundEvent): void {
    for (const handler of this.handlers) {
      handler(event).catch((err: unknown) => {
        console.error(`[Telegram] Handler failed for chat ${event.conversationId}:`, err);
      });
    }
  }

  async start(): Promise<void> {
    console.log('[Telegram] Starting bot...');
    // Polling runs until stop() is called
    this.bot
      .start({ onStart: () => console.log('[Telegram] Bot is running') })
      .catch((err: unknown) => console.error('[Telegram] Polling stopped with an error:', err));
  }

  async stop(): Promise<void> {
    console.log('[Telegram] Stopping bot...');
    await this.bot.stop();
  }

  onEvent(handler: InboundEventHandler): void {
    this.handlers.push(handler);
  }

  async sendImage(conversationId: string, image: OutboundImage, options: SendImageOptions): Promise<TransportRef> {
    const sent = await this.bot.api.sendPhoto(
      Number(conversationId),
      new InputFile(image.data, `image.${extensionFor(image.mimeType)}`),
      {
        caption: options.caption ? options.caption : undefined,
        reply_markup: buildImageKeyboard(options.downloadAffordance),
      },
    );
    return String(sent.message_id);
  }

  async sendText(conversationId: string, text: string): Promise<TransportRef> {
    const sent = await this.bot.api.sendMessage(Number(conversationId), truncateForTelegram(text));
    return String(sent.message_id);
  }

  async sendDocument(conversationId: string, image: OutboundImage, fileName: string): Promise<TransportRef> {
    const sent = await this.bot.api.sendDocument(Number(conversationId), new InputFile(image.data, fileName));
    return String(sent.message_id);
  }

  async deleteMessage(conversationId: string, ref: TransportRef): Promise<boolean> {
    return this.bot.api.deleteMessage(Number(conversationId), Number(ref));
  }
}

import { InputFile, type Context, type InlineKeyboard } from 'grammy';

export interface SentMessage {
  chatId: number;
  messageId: number;
}

export interface ReplyOptions {
  keyboard?: InlineKeyboard;
  markdown?: boolean;
}

/**
 * The part of the Bot API the handlers use
 */
export interface Chat {
  sendText(text: string, options?: ReplyOptions): Promise<SentMessage>;
  sendPhoto(photoUrl: string, caption: string, options?: ReplyOptions): Promise<SentMessage>;
  sendAudio(filePath: string, title: string): Promise<void>;
  sendVideo(filePath: string, caption: string): Promise<void>;
  editText(message: SentMessage, text: string): Promise<void>;
  deleteMessage(message: SentMessage): Promise<void>;
}

export interface CallbackChat extends Chat {
  answerCallback(): Promise<void>;
  removeKeyboard(): Promise<void>;
}

const toSent = (message: { message_id: number; chat: { id: number } }): SentMessage => ({
  chatId: message.chat.id,
  messageId: message.message_id,
});

/**
 * Wraps a grammY context. Replies land in the chat the update came from,
 * which for a button press is the chat holding the menu.
 */
export class TelegramChat implements CallbackChat {
  constructor(private readonly ctx: Context) {}

  private replyOptions(options: ReplyOptions = {}) {
    return {
      ...(options.keyboard ? { reply_markup: options.keyboard } : {}),
      ...(options.markdown ? { parse_mode: 'MarkdownV2' as const } : {}),
    };
  }

  async sendText(text: string, options?: ReplyOptions): Promise<SentMessage> {
    return toSent(await this.ctx.reply(text, this.replyOptions(options)));
  }

  async sendPhoto(photoUrl: string, caption: string, options?: ReplyOptions): Promise<SentMessage> {
    return toSent(await this.ctx.replyWithPhoto(photoUrl, { caption, ...this.replyOptions(options) }));
  }

  async sendAudio(filePath: string, title: string): Promise<void> {
    await this.ctx.replyWithAudio(new InputFile(filePath), { title });
  }

  async sendVideo(filePath: string, caption: string): Promise<void> {
    await this.ctx.replyWithVideo(new InputFile(filePath), { caption, supports_streaming: true });
  }

  async editText(message: SentMessage, text: string): Promise<void> {
    await this.ctx.api.editMessageText(message.chatId, message.messageId, text);
  }

  async deleteMessage(message: SentMessage): Promise<void> {
    await this.ctx.api.deleteMessage(message.chatId, message.messageId);
  }

  async answerCallback(): Promise<void> {
    await this.ctx.answerCallbackQuery();
  }

  async removeKeyboard(): Promise<void> {
    // omitting reply_markup clears the inline keyboard
    await this.ctx.editMessageReplyMarkup();
  }
}

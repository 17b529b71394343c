import type { MessageEntity } from 'grammy/types';

/**
 * True when the message starts with a bot command such as `/start` or `/foo@bot`
 */
export const isCommand = (message: { entities?: MessageEntity[] }): boolean =>
  message.entities?.some((entity) => entity.type === 'bot_command' && entity.offset === 0) ?? false;

/**
 * Escapes every character MarkdownV2 treats as markup
 */
export const escapeMarkdown = (text: string): string =>
  text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');

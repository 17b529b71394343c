import { InlineKeyboard } from 'grammy';
import type { FormatDescriptor, MediaReference } from '../types/index.js';
import { encodeFormatOption } from '../utils/callbackData.js';
import { escapeMarkdown } from '../utils/markdown.js';

// Keeps the menu short enough to read on a phone
export const MAX_VIDEO_OPTIONS = 5;

/**
 * Distinct video heights, best first, capped at `limit`
 */
export function selectResolutions(
  formats: FormatDescriptor[],
  limit = MAX_VIDEO_OPTIONS
): number[] {
  const heights = formats
    .map((format) => format.height)
    .filter((height): height is number => typeof height === 'number' && height > 0)
    .sort((a, b) => b - a);

  return [...new Set(heights)].slice(0, limit);
}

export function buildQualityMenu(media: MediaReference): InlineKeyboard {
  const keyboard = new InlineKeyboard().text(
    '🎵 MP3 / Audio',
    encodeFormatOption({ kind: 'audio', id: media.id })
  );

  for (const resolution of selectResolutions(media.formats)) {
    keyboard
      .row()
      .text(`🎬 ${resolution}p`, encodeFormatOption({ kind: 'video', id: media.id, resolution }));
  }

  return keyboard;
}

export function formatMenuCaption(media: MediaReference): string {
  return `📹 *${escapeMarkdown(media.title)}*\n\nSelect a format:`;
}

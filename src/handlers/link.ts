import type { Chat } from '../bot/chat.js';
import { buildQualityMenu, formatMenuCaption, selectResolutions } from '../services/menu.js';
import type { MediaSource } from '../types/index.js';
import { describeError, logger } from '../utils/logger.js';

export interface LinkDeps {
  media: Pick<MediaSource, 'getMediaInfo'>;
}

/**
 * Looks up the link and answers with a quality menu. The "checking" message
 * is removed once the menu is out, or turned into the error on failure.
 */
export async function handleLink(
  chat: Chat,
  url: string,
  deps: LinkDeps,
  logContext: Record<string, unknown> = {}
): Promise<void> {
  logger.info(`Requested: ${url}`, logContext);
  const status = await chat.sendText('🔍 Checking link...');

  try {
    const media = await deps.media.getMediaInfo(url);
    const keyboard = buildQualityMenu(media);
    const caption = formatMenuCaption(media);

    logger.info(
      `Offering audio and ${selectResolutions(media.formats).length} video options for "${media.title}"`,
      { ...logContext, mediaId: media.id }
    );

    if (media.thumbnail) {
      await chat.sendPhoto(media.thumbnail, caption, { keyboard, markdown: true });
    } else {
      await chat.sendText(caption, { keyboard, markdown: true });
    }

    await chat.deleteMessage(status);
  } catch (error) {
    logger.error('Failed to inspect link', error, logContext);
    await chat.editText(status, `❌ Error: ${describeError(error)}\nLink might not be supported.`);
  }
}

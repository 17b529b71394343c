import { stat } from 'fs/promises';
import type { CallbackChat } from '../bot/chat.js';
import type { DownloadedFile, MediaSource } from '../types/index.js';
import { parseFormatOption } from '../utils/callbackData.js';
import { withDownloadedFile } from '../utils/cleanup.js';
import { formatSize } from '../utils/format.js';
import { describeError, logger } from '../utils/logger.js';

export interface SelectionDeps {
  media: Pick<MediaSource, 'download'>;
  maxFileSize: number;
}

export class FileTooLargeError extends Error {
  constructor(size: number, limit: number) {
    super(`File is too large to upload (${formatSize(size, 1)}, limit ${formatSize(limit, 1)})`);
    this.name = 'FileTooLargeError';
  }
}

async function ensureUploadable(file: DownloadedFile, limit: number): Promise<void> {
  const { size } = await stat(file.path);
  if (size > limit) {
    throw new FileTooLargeError(size, limit);
  }
}

/**
 * Downloads the quality picked from a menu and uploads it to the chat.
 * Progress goes into one status message that is edited in place.
 */
export async function handleSelection(
  chat: CallbackChat,
  data: string,
  deps: SelectionDeps,
  logContext: Record<string, unknown> = {}
): Promise<void> {
  await chat.answerCallback();

  const option = parseFormatOption(data);
  if (!option) {
    logger.warn(`Ignoring unknown callback data: ${data}`, logContext);
    return;
  }

  const context = { ...logContext, mediaId: option.id, kind: option.kind };
  await chat.removeKeyboard();
  const status = await chat.sendText(`⬇️ Downloading ${option.kind}... This might take a moment.`);

  try {
    await withDownloadedFile(
      () => deps.media.download(option),
      async (file) => {
        await chat.editText(status, '⬆️ Uploading to Telegram...');
        await ensureUploadable(file, deps.maxFileSize);

        if (file.kind === 'audio') {
          await chat.sendAudio(file.path, file.title);
        } else {
          await chat.sendVideo(file.path, file.title);
        }

        await chat.deleteMessage(status);
        logger.info(`Delivered ${file.path}`, context);
      }
    );
  } catch (error) {
    logger.error('Download failed', error, context);
    await chat.editText(status, `❌ Download failed: ${describeError(error)}`);
  }
}

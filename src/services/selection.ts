import { join } from 'path';
import type { DownloadPlan, FormatOption } from '../types/index.js';

const AUDIO_FORMAT = 'mp3';
const AUDIO_BITRATE = '192K';
const VIDEO_CONTAINER = 'mp4';

/**
 * Button payloads only carry the media id, so downloads go through a fixed
 * watch URL rather than whatever link the user originally sent.
 */
export const canonicalUrl = (id: string): string =>
  `https://www.youtube.com/watch?v=${encodeURIComponent(id)}`;

export function buildDownloadPlan(option: FormatOption, downloadDir: string): DownloadPlan {
  const url = canonicalUrl(option.id);

  if (option.kind === 'audio') {
    return {
      option,
      url,
      format: 'bestaudio/best',
      outputTemplate: join(downloadDir, '%(id)s.%(ext)s'),
      extraArgs: ['-x', '--audio-format', AUDIO_FORMAT, '--audio-quality', AUDIO_BITRATE],
      filePrefix: `${option.id}.`,
      fallbackExtension: AUDIO_FORMAT,
    };
  }

  const height = option.resolution;
  return {
    option,
    url,
    // exact height merged with the best audio, otherwise whatever yt-dlp picks
    format: `bestvideo[height=${height}]+bestaudio/best[height=${height}]/best`,
    outputTemplate: join(downloadDir, `%(id)s_${height}.%(ext)s`),
    extraArgs: ['--merge-output-format', VIDEO_CONTAINER],
    filePrefix: `${option.id}_${height}.`,
  };
}

export interface DownloadRecord {
  id?: string;
  ext?: string;
  filepath?: string;
  requestedFilepaths: string[];
}

/**
 * Picks the path of the file yt-dlp produced. The per-download records are
 * authoritative; the derived name is a guess at what the template and the
 * audio post-processor would have written.
 */
export function resolveDownloadedPath(
  record: DownloadRecord,
  plan: DownloadPlan,
  downloadDir: string
): string {
  const [requested] = record.requestedFilepaths;
  if (requested) return requested;
  if (record.filepath) return record.filepath;

  const id = record.id ?? plan.option.id;
  const ext = plan.fallbackExtension ?? record.ext ?? VIDEO_CONTAINER;
  const base = plan.option.kind === 'video' ? `${id}_${plan.option.resolution}` : id;
  return join(downloadDir, `${base}.${ext}`);
}

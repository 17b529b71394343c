import type { FormatOption } from '../types/index.js';

const SEPARATOR = '|';

/**
 * Serializes a format option as `audio|<id>` or `video|<id>|<resolution>`.
 * Telegram caps callback data at 64 bytes, which media ids fit comfortably.
 */
export function encodeFormatOption(option: FormatOption): string {
  return option.kind === 'audio'
    ? ['audio', option.id].join(SEPARATOR)
    : ['video', option.id, String(option.resolution)].join(SEPARATOR);
}

/**
 * Parses callback data produced by {@link encodeFormatOption}.
 * Returns null for anything that did not come from a quality menu.
 */
export function parseFormatOption(data: string): FormatOption | null {
  const [kind, ...rest] = data.split(SEPARATOR);

  if (kind === 'audio') {
    const id = rest.join(SEPARATOR);
    return id ? { kind, id } : null;
  }

  if (kind === 'video' && rest.length >= 2) {
    const resolutionText = rest[rest.length - 1];
    const id = rest.slice(0, -1).join(SEPARATOR);
    const resolution = Number(resolutionText);
    if (!id || !/^\d+$/.test(resolutionText) || resolution <= 0) return null;
    return { kind, id, resolution };
  }

  return null;
}

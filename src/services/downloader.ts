import { execFile } from 'child_process';
import { promisify } from 'util';
import type { AppConfig } from '../config/env.js';
import type {
  DownloadedFile,
  FormatDescriptor,
  FormatOption,
  MediaReference,
  MediaSource,
} from '../types/index.js';
import { removeByPrefix } from '../utils/cleanup.js';
import { logger } from '../utils/logger.js';
import { buildDownloadPlan, resolveDownloadedPath, type DownloadRecord } from './selection.js';

const execFileAsync = promisify(execFile);

// yt-dlp's JSON for a single video easily runs past a megabyte
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, { timeout }) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout,
    maxBuffer: MAX_OUTPUT_BYTES,
  });
  return { stdout, stderr };
};

export class YtDlpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'YtDlpError';
  }
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

/**
 * Words a failed yt-dlp run for the chat. The child-process message repeats
 * the full command line, cookies path included, so it is never used.
 */
function toYtDlpError(error: unknown, timeoutSeconds: number): YtDlpError {
  if (!isRecord(error)) return new YtDlpError('yt-dlp failed');

  if (error.killed === true || optionalString(error.signal)) {
    return new YtDlpError(`yt-dlp timed out after ${timeoutSeconds}s`);
  }

  const lines =
    typeof error.stderr === 'string'
      ? error.stderr
          .split('\n')
          .map((line) => line.trim())
          .filter(Boolean)
      : [];
  const reason = lines.filter((line) => line.startsWith('ERROR:')).pop() ?? lines.pop();
  if (reason) return new YtDlpError(reason.replace(/^ERROR:\s*/, ''));

  if (typeof error.code === 'number') {
    return new YtDlpError(`yt-dlp exited with code ${error.code}`);
  }
  if (error.code === 'ENOENT') {
    return new YtDlpError('yt-dlp is not installed or not on the PATH');
  }
  return new YtDlpError('yt-dlp failed');
}

function parseJsonOutput(stdout: string): JsonRecord {
  // --print may emit more than one line; the info dict is the last JSON one
  const line = stdout
    .split('\n')
    .map((entry) => entry.trim())
    .filter((entry) => entry.startsWith('{'))
    .pop();

  if (!line) {
    throw new YtDlpError('yt-dlp returned no media information');
  }

  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed)) {
    throw new YtDlpError('yt-dlp returned malformed media information');
  }
  return parsed;
}

function toFormatDescriptor(value: unknown): FormatDescriptor | null {
  if (!isRecord(value)) return null;
  const formatId = optionalString(value.format_id) ?? String(value.format_id ?? '');
  if (!formatId) return null;

  return {
    formatId,
    height: optionalNumber(value.height),
    ext: optionalString(value.ext),
    vcodec: optionalString(value.vcodec),
    acodec: optionalString(value.acodec),
    filesize: optionalNumber(value.filesize) ?? optionalNumber(value.filesize_approx),
  };
}

export function toMediaReference(info: JsonRecord): MediaReference {
  const id = optionalString(info.id);
  if (!id) {
    throw new YtDlpError('yt-dlp did not report a media id');
  }

  const formats = Array.isArray(info.formats)
    ? info.formats
        .map(toFormatDescriptor)
        .filter((format): format is FormatDescriptor => format !== null)
    : [];

  return {
    id,
    title: optionalString(info.title) ?? 'Unknown Title',
    thumbnail: optionalString(info.thumbnail),
    duration: optionalNumber(info.duration),
    formats,
  };
}

export function toDownloadRecord(info: JsonRecord): DownloadRecord {
  const requested = Array.isArray(info.requested_downloads) ? info.requested_downloads : [];
  return {
    id: optionalString(info.id),
    ext: optionalString(info.ext),
    filepath: optionalString(info.filepath),
    requestedFilepaths: requested
      .map((entry) => (isRecord(entry) ? optionalString(entry.filepath) : undefined))
      .filter((path): path is string => path !== undefined),
  };
}

/**
 * Talks to yt-dlp: metadata lookups for the quality menu and the actual
 * download once a quality is picked.
 */
export class MediaDownloader implements MediaSource {
  constructor(
    private readonly config: Pick<
      AppConfig,
      'downloadDir' | 'downloadTimeout' | 'ytDlpPath' | 'cookiesFile'
    >,
    private readonly run: CommandRunner = runCommand
  ) {}

  private get commonArgs(): string[] {
    const args = ['--no-playlist', '--no-warnings'];
    if (this.config.cookiesFile) {
      args.push('--cookies', this.config.cookiesFile);
    }
    return args;
  }

  private async ytDlp(args: string[]): Promise<JsonRecord> {
    let result: CommandResult;
    try {
      result = await this.run(this.config.ytDlpPath, args, {
        timeout: this.config.downloadTimeout * 1000,
      });
    } catch (error) {
      logger.debug('yt-dlp run failed', { error });
      throw toYtDlpError(error, this.config.downloadTimeout);
    }

    if (result.stderr.trim()) {
      logger.debug('yt-dlp stderr', { stderr: result.stderr.trim() });
    }
    return parseJsonOutput(result.stdout);
  }

  /**
   * Resolves metadata and the format list without downloading anything
   */
  public async getMediaInfo(url: string): Promise<MediaReference> {
    const info = await this.ytDlp([...this.commonArgs, '--dump-single-json', url]);
    const media = toMediaReference(info);
    logger.debug(`Resolved ${media.formats.length} formats`, { mediaId: media.id });
    return media;
  }

  public async download(option: FormatOption): Promise<DownloadedFile> {
    const plan = buildDownloadPlan(option, this.config.downloadDir);
    logger.info(`Downloading with format spec ${plan.format}`, {
      mediaId: option.id,
      kind: option.kind,
    });

    const info = await this.ytDlp([
      ...this.commonArgs,
      '--no-progress',
      '--no-simulate',
      '--print',
      'after_move:%()j',
      '--format',
      plan.format,
      '--output',
      plan.outputTemplate,
      ...plan.extraArgs,
      plan.url,
    ]).catch(async (error: unknown) => {
      // partial .part and per-format files of a killed or failed run
      await removeByPrefix(this.config.downloadDir, plan.filePrefix);
      throw error;
    });

    const path = resolveDownloadedPath(toDownloadRecord(info), plan, this.config.downloadDir);
    const title = optionalString(info.title) ?? (option.kind === 'audio' ? 'Audio' : 'Video');

    return { path, title, kind: option.kind };
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  readonly botToken: string;
  readonly managedHosting: boolean;
  readonly port: number;
  readonly downloadDir: string;
  readonly maxFileSize: number; // bytes
  readonly downloadTimeout: number; // seconds
  readonly ytDlpPath: string;
  readonly cookiesFile?: string;
}

type EnvSource = Record<string, string | undefined>;

// Bot API refuses uploads above 50MB unless a local API server is used
const DEFAULT_MAX_FILE_SIZE = 50 * 1024 * 1024;

const parsePositiveInt = (source: EnvSource, key: string, fallback: number): number => {
  const raw = source[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
};

/**
 * Builds the configuration once at startup. Everything downstream receives
 * the returned object instead of reading process.env itself.
 */
export const loadConfig = (source: EnvSource = process.env): AppConfig => {
  const botToken = (source.TELEGRAM_BOT_TOKEN || source.BOT_TOKEN || '').trim();
  if (!botToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN environment variable is required');
  }

  const cookiesFile = source.COOKIES_FILE?.trim();

  return {
    botToken,
    managedHosting: Boolean(source.RENDER?.trim()),
    port: parsePositiveInt(source, 'PORT', 8080),
    downloadDir: source.DOWNLOAD_DIR?.trim() || './downloads',
    maxFileSize: parsePositiveInt(source, 'MAX_FILE_SIZE', DEFAULT_MAX_FILE_SIZE),
    downloadTimeout: parsePositiveInt(source, 'DOWNLOAD_TIMEOUT', 300),
    ytDlpPath: source.YTDLP_PATH?.trim() || 'yt-dlp',
    ...(cookiesFile ? { cookiesFile } : {}),
  };
};

export type MediaKind = 'audio' | 'video';

export interface FormatDescriptor {
  formatId: string;
  height?: number;
  ext?: string;
  vcodec?: string;
  acodec?: string;
  filesize?: number;
}

export interface MediaReference {
  id: string;
  title: string;
  thumbnail?: string;
  duration?: number;
  formats: FormatDescriptor[];
}

/**
 * What a quality button asks for. The whole value travels inside the
 * button's callback data, so nothing is kept on the server between the
 * menu and the click.
 */
export type FormatOption =
  | { kind: 'audio'; id: string }
  | { kind: 'video'; id: string; resolution: number };

export interface DownloadPlan {
  option: FormatOption;
  url: string;
  format: string;
  outputTemplate: string;
  extraArgs: string[];
  /** Every file yt-dlp writes for this plan starts with it */
  filePrefix: string;
  fallbackExtension?: string;
}

export interface DownloadedFile {
  path: string;
  title: string;
  kind: MediaKind;
}

export interface MediaSource {
  getMediaInfo(url: string): Promise<MediaReference>;
  download(option: FormatOption): Promise<DownloadedFile>;
}

import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it, vi } from 'vitest';
import { MediaDownloader, YtDlpError, type CommandRunner } from './downloader.js';

const config = {
  downloadDir: 'downloads',
  downloadTimeout: 300,
  ytDlpPath: 'yt-dlp',
};

const runnerReturning = (stdout: string) =>
  vi.fn<CommandRunner>().mockResolvedValue({ stdout, stderr: '' });

describe('MediaDownloader.getMediaInfo', () => {
  it('reads metadata without downloading', async () => {
    const run = runnerReturning(
      JSON.stringify({
        id: 'abc123',
        title: 'Clip',
        thumbnail: 'https://img.example/thumb.jpg',
        duration: 63,
        formats: [
          { format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', height: null },
          { format_id: '137', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 1080, filesize: 1000 },
        ],
      }) + '\n'
    );

    const media = await new MediaDownloader(config, run).getMediaInfo('https://youtu.be/abc123');

    expect(run).toHaveBeenCalledWith(
      'yt-dlp',
      ['--no-playlist', '--no-warnings', '--dump-single-json', 'https://youtu.be/abc123'],
      { timeout: 300_000 }
    );
    expect(media).toEqual({
      id: 'abc123',
      title: 'Clip',
      thumbnail: 'https://img.example/thumb.jpg',
      duration: 63,
      formats: [
        { formatId: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2' },
        { formatId: '137', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 1080, filesize: 1000 },
      ],
    });
  });

  it('passes the cookies file when configured', async () => {
    const run = runnerReturning(JSON.stringify({ id: 'abc123' }));

    const media = await new MediaDownloader({ ...config, cookiesFile: 'cookies.txt' }, run).getMediaInfo(
      'https://youtu.be/abc123'
    );

    expect(run.mock.calls[0][1]).toEqual([
      '--no-playlist',
      '--no-warnings',
      '--cookies',
      'cookies.txt',
      '--dump-single-json',
      'https://youtu.be/abc123',
    ]);
    expect(media).toEqual({ id: 'abc123', title: 'Unknown Title', formats: [] });
  });

  it('rejects metadata without an id', async () => {
    const downloader = new MediaDownloader(config, runnerReturning(JSON.stringify({ title: 'Clip' })));

    await expect(downloader.getMediaInfo('https://example.com/x')).rejects.toThrow(
      'yt-dlp did not report a media id'
    );
  });

  it('surfaces the ERROR line of a failed run', async () => {
    const failure = Object.assign(new Error('Command failed: yt-dlp ...'), {
      stderr: 'WARNING: something odd\nERROR: Unsupported URL: https://example.com/x\n',
    });
    const run = vi.fn<CommandRunner>().mockRejectedValue(failure);

    const result = new MediaDownloader(config, run).getMediaInfo('https://example.com/x');

    await expect(result).rejects.toBeInstanceOf(YtDlpError);
    await expect(result).rejects.toThrow('Unsupported URL: https://example.com/x');
  });
});

describe('yt-dlp failures', () => {
  const info = (run: CommandRunner, cookiesFile?: string) =>
    new MediaDownloader({ ...config, ...(cookiesFile ? { cookiesFile } : {}) }, run).getMediaInfo(
      'https://youtu.be/abc123'
    );

  it('reports a timeout without echoing the command line', async () => {
    const killed = Object.assign(
      new Error('Command failed: yt-dlp --no-playlist --cookies /secrets/cookies.txt https://youtu.be/abc123'),
      { killed: true, signal: 'SIGTERM', stderr: '' }
    );

    const result = info(vi.fn<CommandRunner>().mockRejectedValue(killed), '/secrets/cookies.txt');

    await expect(result).rejects.toBeInstanceOf(YtDlpError);
    await expect(result).rejects.toThrow(/^yt-dlp timed out after 300s$/);
  });

  it('falls back to the last stderr line when there is no ERROR line', async () => {
    const failure = Object.assign(new Error('Command failed: yt-dlp ...'), {
      code: 1,
      stderr: 'WARNING: slow\nffmpeg not found\n\n',
    });

    await expect(info(vi.fn<CommandRunner>().mockRejectedValue(failure))).rejects.toThrow(
      /^ffmpeg not found$/
    );
  });

  it('falls back to the exit code when stderr is empty', async () => {
    const failure = Object.assign(new Error('Command failed: yt-dlp ...'), { code: 2, stderr: '' });

    await expect(info(vi.fn<CommandRunner>().mockRejectedValue(failure))).rejects.toThrow(
      /^yt-dlp exited with code 2$/
    );
  });
});

describe('MediaDownloader.download leftovers', () => {
  const withDir = async (test: (dir: string) => Promise<void>) => {
    const dir = await mkdtemp(join(tmpdir(), 'mediapick-downloader-'));
    try {
      await test(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  };

  const runnerLeaving = (dir: string, files: string[], stderr: string) =>
    vi.fn<CommandRunner>(async () => {
      await Promise.all(files.map((file) => writeFile(join(dir, file), 'partial')));
      throw Object.assign(new Error('Command failed: yt-dlp ...'), { code: 1, stderr });
    });

  it('removes partial files of a failed video download and nothing else', async () => {
    await withDir(async (dir) => {
      await writeFile(join(dir, 'abc123_1080.mp4'), 'other download');
      const run = runnerLeaving(
        dir,
        ['abc123_720.f136.mp4.part', 'abc123_720.f140.m4a'],
        'ERROR: Postprocessing: Conversion failed!\n'
      );

      await expect(
        new MediaDownloader({ ...config, downloadDir: dir }, run).download({
          kind: 'video',
          id: 'abc123',
          resolution: 720,
        })
      ).rejects.toThrow('Postprocessing: Conversion failed!');
      expect(await readdir(dir)).toEqual(['abc123_1080.mp4']);
    });
  });

  it('removes partial files of a failed audio download', async () => {
    await withDir(async (dir) => {
      await writeFile(join(dir, 'abc123_720.mp4'), 'other download');
      const run = runnerLeaving(dir, ['abc123.webm.part'], 'ERROR: unable to download\n');

      await expect(
        new MediaDownloader({ ...config, downloadDir: dir }, run).download({ kind: 'audio', id: 'abc123' })
      ).rejects.toThrow('unable to download');
      expect(await readdir(dir)).toEqual(['abc123_720.mp4']);
    });
  });
});

describe('MediaDownloader.download', () => {
  it('downloads the chosen height and reports the merged file', async () => {
    const run = runnerReturning(
      '[info] abc123: Downloading 1 format(s)\n' +
        JSON.stringify({
          id: 'abc123',
          title: 'Clip',
          ext: 'mp4',
          requested_downloads: [{ filepath: '/srv/downloads/abc123_1080.mp4' }],
        })
    );

    const file = await new MediaDownloader(config, run).download({
      kind: 'video',
      id: 'abc123',
      resolution: 1080,
    });

    expect(file).toEqual({ path: '/srv/downloads/abc123_1080.mp4', title: 'Clip', kind: 'video' });
    const args = run.mock.calls[0][1];
    expect(args).toEqual([
      '--no-playlist',
      '--no-warnings',
      '--no-progress',
      '--no-simulate',
      '--print',
      'after_move:%()j',
      '--format',
      'bestvideo[height=1080]+bestaudio/best[height=1080]/best',
      '--output',
      join('downloads', '%(id)s_1080.%(ext)s'),
      '--merge-output-format',
      'mp4',
      'https://www.youtube.com/watch?v=abc123',
    ]);
  });

  it('derives the mp3 name when yt-dlp reports no path', async () => {
    const run = runnerReturning(JSON.stringify({ id: 'abc123', ext: 'webm' }));

    const file = await new MediaDownloader(config, run).download({ kind: 'audio', id: 'abc123' });

    expect(file).toEqual({ path: join('downloads', 'abc123.mp3'), title: 'Audio', kind: 'audio' });
  });

  it('fails when yt-dlp prints nothing', async () => {
    const downloader = new MediaDownloader(config, runnerReturning(''));

    await expect(downloader.download({ kind: 'audio', id: 'abc123' })).rejects.toThrow(
      'yt-dlp returned no media information'
    );
  });
});

import { execa } from 'execa';
import { ENV } from '../config.js';
import { debug, info, warn } from '../utils/log.js';
import { findFile, makeTempDir, removeDir } from '../utils/fsutil.js';
import { isYouTubeUrl, toWatchUrl } from '../utils/ids.js';
import { FetchError, ResourceError, errorMessage } from './errors.js';

/** A downloaded audio file the job owns until `release()`. */
export interface AudioResource {
  readonly path: string;
  release(): Promise<void>;
}

export interface AudioFetcher {
  fetch(videoUrl: string, signal?: AbortSignal): Promise<AudioResource>;
}

export interface YtDlpOptions {
  tempDir?: string;
  bin?: string;
  pythonBin?: string;
  cookiesFile?: string;
  extraArgs?: string;
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    if ('stderr' in err && typeof err.stderr === 'string' && err.stderr) return err.stderr;
    if ('shortMessage' in err && typeof err.shortMessage === 'string') return err.shortMessage;
  }
  return errorMessage(err);
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Turns yt-dlp's stderr into a short reason a user can act on. */
export function describeDownloadFailure(stderr: string): string {
  if (/unsupported url/i.test(stderr)) return 'Unsupported URL';
  if (/private video/i.test(stderr)) return 'Video is private';
  if (/video unavailable|not available|has been removed/i.test(stderr)) return 'Video unavailable';
  if (/sign in to confirm/i.test(stderr)) return 'YouTube requires sign-in for this video';
  if (/http error 4\d\d/i.test(stderr)) return 'Video page rejected the request';
  if (/unable to download|timed out|network|connection/i.test(stderr)) return 'Network error while downloading';
  const last = stderr.trim().split('\n').pop() ?? '';
  return last.replace(/^ERROR:\s*/, '').slice(0, 200) || 'Download failed';
}

class TempAudio implements AudioResource {
  private released = false;

  constructor(readonly path: string, private readonly dir: string) {}

  async release() {
    if (this.released) return;
    this.released = true;
    await removeDir(this.dir);
    debug('audio.released', { dir: this.dir });
  }
}

/** Extracts audio with yt-dlp into a private temp directory per job. */
export class YtDlpFetcher implements AudioFetcher {
  private readonly opts: Required<YtDlpOptions>;

  constructor(opts: YtDlpOptions = {}) {
    this.opts = {
      tempDir: opts.tempDir ?? ENV.tempDir,
      bin: opts.bin ?? ENV.ytdlpBin,
      pythonBin: opts.pythonBin ?? ENV.ytdlpPythonBin,
      cookiesFile: opts.cookiesFile ?? ENV.ytdlpCookiesFile,
      extraArgs: opts.extraArgs ?? ENV.ytdlpExtraArgs,
    };
  }

  async fetch(videoUrl: string, signal?: AbortSignal): Promise<AudioResource> {
    const url = toWatchUrl(videoUrl);
    if (!isYouTubeUrl(url)) {
      throw new FetchError(`Unsupported URL: ${url}`);
    }

    let dir: string;
    try {
      dir = await makeTempDir(this.opts.tempDir, 'job-');
    } catch (e) {
      throw new ResourceError(`Cannot allocate temporary audio file: ${errorMessage(e)}`, { cause: e });
    }
    const resource = new TempAudio(`${dir}/audio.mp3`, dir);

    try {
      await this.download(url, dir, signal);
      const file = await findFile(dir, '.mp3');
      if (!file) throw new FetchError('Audio file not found after download');
      return new TempAudio(file, dir);
    } catch (e) {
      await resource.release();
      throw e;
    }
  }

  private async download(url: string, dir: string, signal?: AbortSignal) {
    const args = [
      '-f',
      'bestaudio/best',
      '-x',
      '--audio-format',
      'mp3',
      '--audio-quality',
      '192K',
      '--no-playlist',
      '--quiet',
      '--no-warnings',
      '-o',
      `${dir}/audio.%(ext)s`,
    ];
    if (this.opts.cookiesFile) args.push('--cookies', this.opts.cookiesFile);
    if (this.opts.extraArgs) args.push(...this.opts.extraArgs.split(' ').filter(Boolean));
    args.push(url);

    const attempts: Array<[string, string[]]> = [[this.opts.bin, args]];
    if (this.opts.bin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
    if (this.opts.pythonBin) attempts.push([this.opts.pythonBin, ['-m', 'yt_dlp', ...args]]);
    attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);

    const missing: string[] = [];
    for (const [cmd, a] of attempts) {
      try {
        info('download.start', { cmd, url });
        await execa(cmd, a, { signal, stdio: 'pipe' });
        return;
      } catch (e) {
        if (signal?.aborted) throw new FetchError('Download aborted', { cause: e });
        if (isMissingBinary(e) || /No module named yt_dlp/.test(stderrOf(e))) {
          missing.push(cmd);
          continue;
        }
        const stderr = stderrOf(e);
        warn('download.fail', { cmd, url, stderrSnippet: stderr.slice(-400) });
        throw new FetchError(describeDownloadFailure(stderr), { cause: e });
      }
    }
    throw new FetchError(`yt-dlp is not installed (tried ${missing.join(', ')})`);
  }
}

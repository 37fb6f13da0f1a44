import os from 'os';
import path from 'path';

// process.env is populated by `dotenv/config` in the entry point

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const ENV = Object.freeze({
  port: num(process.env.PORT, 8000),
  host: process.env.HOST || '127.0.0.1',
  // Unset keeps the cache in process memory
  redisUrl: process.env.REDIS_URL || '',
  cacheTtlDays: num(process.env.CACHE_TTL_DAYS, 7),
  // Only bounds the in-memory store; Redis manages its own memory
  cacheMaxEntries: num(process.env.CACHE_MAX_ENTRIES, 1000),
  jobTimeoutMs: num(process.env.JOB_TIMEOUT_MS, 30 * 60 * 1000),
  keepAliveIntervalMs: num(process.env.KEEPALIVE_INTERVAL_MS, 15000),
  tempDir: process.env.TEMP_DIR || path.join(os.tmpdir(), 'yt-ai-subtitles'),
  ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
  // Interpreter with yt_dlp installed, tried when the binary is missing (e.g. .venv/bin/python)
  ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
  ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
  ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
  defaultProvider: process.env.DEFAULT_PROVIDER || 'openai',
});

export const VERSION = '1.0.0';

const YOUTUBE_HOSTS = ['youtube.com', 'www.youtube.com', 'm.youtube.com', 'music.youtube.com', 'youtu.be'];

export function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}

export function isYouTubeUrl(value: string): boolean {
  try {
    return YOUTUBE_HOSTS.includes(new URL(value.trim()).hostname.toLowerCase());
  } catch {
    return false;
  }
}

/** Extracts the YouTube video id from a URL, or returns the input when it already is one. */
export function toVideoId(videoOrUrl: string): string {
  const value = videoOrUrl.trim();
  const urlMatch = value.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = value.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  const embedded = value.match(/youtube\.com\/(?:shorts|embed|live)\/([a-zA-Z0-9_-]{6,})/);
  if (embedded) return embedded[1];
  return value;
}

export function toWatchUrl(videoOrUrl: string): string {
  const value = videoOrUrl.trim();
  return isUrl(value) ? value : `https://www.youtube.com/watch?v=${encodeURIComponent(value)}`;
}

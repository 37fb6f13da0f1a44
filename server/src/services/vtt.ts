import type { Cue } from '../models/types.js';

export const VTT_HEADER = 'WEBVTT';

const TIMING_LINE =
  /((?:\d{2,}:)?\d{2}:\d{2}\.\d{3})\s*-->\s*((?:\d{2,}:)?\d{2}:\d{2}\.\d{3})/;

function pad(n: number, width = 2) {
  const s = String(n);
  return s.length >= width ? s : '0'.repeat(width - s.length) + s;
}

/** Seconds to `HH:MM:SS.mmm`, rounded to the millisecond. */
export function formatTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const millis = totalMs % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)}.${pad(millis, 3)}`;
}

/**
 * `HH:MM:SS.mmm` or `MM:SS.mmm` to seconds. Accumulates whole milliseconds so
 * that `parseTimestamp(formatTimestamp(v)) === v` for millisecond values.
 */
export function parseTimestamp(value: string): number {
  const parts = value.trim().split(':');
  let ms = 0;
  if (parts.length === 3) {
    ms += parseInt(parts[0], 10) * 3600000;
    ms += parseInt(parts[1], 10) * 60000;
    ms += Math.round(parseFloat(parts[2]) * 1000);
  } else if (parts.length === 2) {
    ms += parseInt(parts[0], 10) * 60000;
    ms += Math.round(parseFloat(parts[1]) * 1000);
  } else {
    ms += Math.round(parseFloat(parts[0]) * 1000);
  }
  return ms / 1000;
}

/**
 * Line-oriented and lenient: a timing line opens a cue, other non-blank lines
 * extend the open cue's text, and lines outside any cue are dropped.
 */
export function parseVtt(text: string): Cue[] {
  const cues: Cue[] = [];
  let current: Cue | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line === VTT_HEADER || line.startsWith(`${VTT_HEADER} `)) continue;

    const timing = TIMING_LINE.exec(line);
    if (timing) {
      if (current) cues.push(current);
      current = { start: parseTimestamp(timing[1]), end: parseTimestamp(timing[2]), text: '' };
    } else if (current) {
      current.text = current.text ? `${current.text}\n${line}` : line;
    }
  }
  if (current) cues.push(current);
  return cues;
}

export function serializeVtt(cues: readonly Cue[]): string {
  const parts: string[] = [VTT_HEADER, ''];
  for (const cue of cues) {
    parts.push(`${formatTimestamp(cue.start)} --> ${formatTimestamp(cue.end)}`);
    parts.push(cue.text.trim());
    parts.push('');
  }
  return parts.join('\n') + '\n';
}

/** `[MM:SS] text` lines, hours shown once the transcript passes one hour. */
export function cuesToPlainText(cues: readonly Cue[]): string {
  const showHours = cues.some((c) => c.start >= 3600);
  return cues
    .map((c) => {
      const totalSec = Math.floor(c.start);
      const h = Math.floor(totalSec / 3600);
      const m = Math.floor((totalSec % 3600) / 60);
      const s = totalSec % 60;
      const tag = showHours ? `${pad(h)}:${pad(m)}:${pad(s)}` : `${pad(m + h * 60)}:${pad(s)}`;
      return `[${tag}] ${c.text.replace(/\n/g, ' ')}`;
    })
    .join('\n');
}

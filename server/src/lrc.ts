import { TimedText } from "./types";

const LINE_TAG = /\[(\d{1,3}):(\d{1,2}(?:\.\d{1,3})?)\]/g;
const WORD_TAG = /<(\d{1,3}):(\d{1,2}(?:\.\d{1,3})?)>([^<]*)/g;
const ANY_BRACKET_TAG = /\[[^\]]*\]/g;

function toSeconds(minutes: string, seconds: string): number {
  return parseInt(minutes, 10) * 60 + parseFloat(seconds);
}

/**
 * True when the document carries per-word timing (`<mm:ss.xx>word`)
 */
export function isEnhancedLrc(lrc: string): boolean {
  return /<\d{1,3}:\d{1,2}(?:\.\d{1,3})?>/.test(lrc);
}

function parseRegularLine(line: string): TimedText[] {
  const tags = Array.from(line.matchAll(LINE_TAG));
  if (tags.length === 0) {
    return [];
  }
  const text = line.replace(ANY_BRACKET_TAG, "").trim();
  if (!text) {
    return [];
  }
  // A line may repeat for several times, e.g. [00:12.00][01:30.00]chorus
  return tags.map(([tag, minutes, seconds]) => ({
    timestamp: tag,
    timeSeconds: toSeconds(minutes, seconds),
    text,
  }));
}

function parseEnhancedLine(line: string): TimedText | null {
  const words = Array.from(line.matchAll(WORD_TAG));
  if (words.length === 0) {
    return parseRegularLine(line)[0] ?? null;
  }

  const text = words
    .map(([, , , word]) => word.trim())
    .filter(Boolean)
    .join(" ");
  if (!text) {
    return null;
  }

  const lineTag = line.match(/^\s*\[(\d{1,3}):(\d{1,2}(?:\.\d{1,3})?)\]/);
  if (lineTag) {
    return { timestamp: `[${lineTag[1]}:${lineTag[2]}]`, timeSeconds: toSeconds(lineTag[1], lineTag[2]), text };
  }
  const [, minutes, seconds] = words[0];
  return { timestamp: `[${minutes}:${seconds}]`, timeSeconds: toSeconds(minutes, seconds), text };
}

/**
 * Parse regular or enhanced LRC into lines sorted by start time. Metadata tags
 * ([ar:...], [ti:...]) and untimed lines are dropped.
 */
export function parseLrc(lrc: string): TimedText[] {
  const enhanced = isEnhancedLrc(lrc);
  const lines: TimedText[] = [];

  for (const raw of lrc.split(/\r?\n/)) {
    if (!raw.trim()) {
      continue;
    }
    if (enhanced) {
      const parsed = parseEnhancedLine(raw);
      if (parsed) {
        lines.push(parsed);
      }
    } else {
      lines.push(...parseRegularLine(raw));
    }
  }

  // Array.prototype.sort is stable, so equal times keep document order.
  return lines.sort((a, b) => a.timeSeconds - b.timeSeconds);
}

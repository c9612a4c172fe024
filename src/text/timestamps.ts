/**
 * Parse `hh:mm:ss`, `mm:ss` or `ss`, with an optional `.` or `,` fraction,
 * into seconds.
 */
export function parseTimestamp(timestamp: string): number {
  const parts = timestamp.trim().replace(",", ".").split(":");
  if (parts.length > 3 || parts.some((part) => !/^\d+(\.\d+)?$/.test(part))) {
    throw new Error(`Invalid timestamp format: ${timestamp}`);
  }
  return parts.map(Number).reduce((total, part) => total * 60 + part, 0);
}

/** SubRip clock, `hh:mm:ss,mmm`. */
export function formatSrtTimestamp(ms: number): string {
  const millis = Math.max(0, Math.floor(ms));
  const totalSeconds = Math.floor(millis / 1000);
  const remainderMillis = millis % 1000;
  const seconds = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);
  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${seconds.toString().padStart(2, "0")},${remainderMillis
    .toString()
    .padStart(3, "0")}`;
}

export function roundTime(seconds: number, digits = 3): number {
  const factor = 10 ** digits;
  return Math.round(seconds * factor) / factor;
}

const BRACKETED_SPEAKER = /^\s*\[([^\]]{1,40})\]\s*:?\s*(.*)$/;
const NAMED_SPEAKER = /^\s*([A-Z][\w.'-]*(?: [A-Z0-9][\w.'-]*){0,3}):\s+(.*)$/;

/**
 * Split a leading `Name:` or `[Name]` off a line of dialogue.
 */
export function splitSpeaker(line: string): { speaker: string | null; text: string } {
  const match = BRACKETED_SPEAKER.exec(line) ?? NAMED_SPEAKER.exec(line);
  if (match) {
    return { speaker: match[1].trim(), text: match[2].trim() };
  }
  return { speaker: null, text: line.trim() };
}

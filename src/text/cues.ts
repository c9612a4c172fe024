import { Cue, Token, TranscriptSegment } from "../types";
import { parseTimestamp, splitSpeaker } from "./timestamps";

const SENTENCE_ENDERS = new Set(["。", "｡", ".", "．", "！", "!", "？", "?"]);
const WORDS_PER_SECOND = 2.5;

const SRT_TIMING =
  /^\s*(\d{1,2}:\d{2}:\d{2}[,.]\d{1,3})\s*-->\s*(\d{1,2}:\d{2}:\d{2}[,.]\d{1,3})/;
const LINE_TIMESTAMP =
  /^\s*\[?((?:\d{1,2}:)?\d{1,2}:\d{2}(?:[.,]\d+)?)\]?\s*(?:[-–—|]\s*)?(.*)$/;

function byStart(a: Cue, b: Cue): number {
  return a.start - b.start || a.end - b.end;
}

/**
 * Parse SubRip text. A `Name:` or `[Name]` prefix on the first text line of
 * a cue becomes its speaker.
 */
export function parseSrt(content: string): Cue[] {
  const cues: Cue[] = [];
  const blocks = content.replace(/^\uFEFF/, "").split(/\r?\n\s*\r?\n/);
  for (const block of blocks) {
    const lines = block.split(/\r?\n/).filter((line) => line.trim().length > 0);
    const timingIndex = lines.findIndex((line) => SRT_TIMING.test(line));
    if (timingIndex < 0) {
      continue;
    }
    const timing = SRT_TIMING.exec(lines[timingIndex]);
    if (!timing) {
      continue;
    }
    const textLines = lines.slice(timingIndex + 1);
    if (textLines.length === 0) {
      continue;
    }
    const { speaker, text } = splitSpeaker(textLines[0]);
    cues.push({
      start: parseTimestamp(timing[1]),
      end: parseTimestamp(timing[2]),
      text: [text, ...textLines.slice(1).map((line) => line.trim())].join(" ").trim(),
      speaker
    });
  }
  return cues.sort(byStart);
}

function estimatedDuration(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return Math.max(1, words / WORDS_PER_SECOND);
}

/**
 * Parse lines such as `[00:01:12] Alice: hello` or `1:12 - build started`.
 * Each cue ends where the next one starts. Lines without a timestamp
 * continue the previous cue.
 */
export function parseTimestampedText(content: string): Cue[] {
  const entries: { start: number; speaker: string | null; text: string }[] = [];
  for (const rawLine of content.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    if (rawLine.trim().length === 0) {
      continue;
    }
    const match = LINE_TIMESTAMP.exec(rawLine);
    if (match) {
      const { speaker, text } = splitSpeaker(match[2]);
      entries.push({ start: parseTimestamp(match[1]), speaker, text });
    } else if (entries.length > 0) {
      const previous = entries[entries.length - 1];
      previous.text = `${previous.text} ${rawLine.trim()}`.trim();
    }
  }

  entries.sort((a, b) => a.start - b.start);
  return entries.map((entry, index) => {
    const next = entries[index + 1];
    const end = next ? next.start : entry.start + estimatedDuration(entry.text);
    return { start: entry.start, end, text: entry.text, speaker: entry.speaker };
  });
}

const NESTED_TOKEN_KEYS = ["alternatives", "paragraphs", "turns", "entries", "results", "items"] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isToken(value: unknown): value is Token {
  return isRecord(value) && typeof value.text === "string";
}

function collectTokens(value: unknown): Token[] {
  if (Array.isArray(value)) {
    if (value.length > 0 && value.every(isToken)) {
      return value;
    }
    return value.flatMap((item) => collectTokens(item));
  }
  if (!isRecord(value)) {
    return [];
  }
  const tokens: Token[] = [];
  if (Array.isArray(value.tokens)) {
    tokens.push(...value.tokens.filter(isToken));
  }
  for (const key of NESTED_TOKEN_KEYS) {
    if (value[key] !== undefined) {
      tokens.push(...collectTokens(value[key]));
    }
  }
  return tokens;
}

/** Diarization labels are bare numbers; give them a readable name. */
function displaySpeaker(speaker: string): string {
  return /^\d+$/.test(speaker) ? `Speaker ${speaker}` : speaker;
}

/**
 * Group speech-to-text tokens into cues at speaker changes, sentence ends
 * and silences longer than `gapMs`.
 */
export function tokensToCues(tokens: Token[], gapMs: number): Cue[] {
  const cues: Cue[] = [];
  let current: Token[] = [];
  let currentStart: number | undefined;
  let currentEnd: number | undefined;
  let currentSpeaker: string | null | undefined;

  const close = (): void => {
    const text = current.map((token) => token.text ?? "").join("").trim();
    if (text && currentStart !== undefined) {
      cues.push({
        start: currentStart / 1000,
        end: (currentEnd ?? currentStart) / 1000,
        text,
        speaker: currentSpeaker ?? null
      });
    }
    current = [];
    currentStart = undefined;
    currentEnd = undefined;
    currentSpeaker = undefined;
  };

  for (const token of tokens) {
    const text = token.text ?? "";
    if (!text) {
      continue;
    }
    const speaker = token.speaker ? displaySpeaker(token.speaker) : undefined;
    if (
      current.length > 0 &&
      speaker !== undefined &&
      currentSpeaker !== undefined &&
      speaker !== currentSpeaker
    ) {
      close();
    }
    if (
      current.length > 0 &&
      currentEnd !== undefined &&
      token.start_ms !== undefined &&
      token.start_ms - currentEnd > gapMs
    ) {
      close();
    }

    current.push(token);
    if (token.start_ms !== undefined) {
      currentStart = currentStart === undefined ? token.start_ms : Math.min(currentStart, token.start_ms);
    }
    const end = token.end_ms ?? token.start_ms;
    if (end !== undefined) {
      currentEnd = currentEnd === undefined ? end : Math.max(currentEnd, end);
    }
    if (currentSpeaker === undefined && speaker !== undefined) {
      currentSpeaker = speaker;
    }

    const trimmed = text.trim();
    if (trimmed && SENTENCE_ENDERS.has(trimmed.slice(-1))) {
      close();
    }
  }
  close();
  return cues;
}

function isSegment(value: unknown): value is TranscriptSegment {
  return (
    isRecord(value) &&
    typeof value.start === "number" &&
    typeof value.end === "number" &&
    typeof value.text === "string" &&
    (value.speaker === undefined || value.speaker === null || typeof value.speaker === "string")
  );
}

/**
 * Cues from a JSON transcript with either second-based `segments` or
 * millisecond `tokens`.
 */
export function cuesFromTranscript(transcript: Record<string, unknown>, gapMs: number): Cue[] {
  const segments = Array.isArray(transcript.segments) ? transcript.segments.filter(isSegment) : [];
  if (segments.length > 0) {
    return segments
      .map((segment) => {
        const split = segment.speaker
          ? { speaker: segment.speaker, text: segment.text.trim() }
          : splitSpeaker(segment.text);
        return { start: segment.start, end: segment.end, text: split.text, speaker: split.speaker };
      })
      .filter((cue) => cue.text.length > 0)
      .sort(byStart);
  }
  return tokensToCues(collectTokens(transcript), gapMs).sort(byStart);
}

import fs from "node:fs";
import path from "node:path";

import { decodeWithFfmpeg } from "./audio/ffmpeg";
import { decodeWav } from "./audio/wav";
import { DEFAULT_GAP_SEC } from "./config";
import { cuesFromTranscript, isRecord, parseSrt, parseTimestampedText } from "./text/cues";
import { Cue, LoadedInput } from "./types";

export const FFMPEG_EXTENSIONS = new Set([".mp3", ".flac", ".ogg", ".m4a", ".aac", ".opus", ".webm"]);
export const TEXT_EXTENSIONS = new Set([".txt", ".md", ".log"]);

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export interface LoadInputOptions {
  /** Silence that splits speech-to-text tokens into separate cues. */
  gapSec?: number;
}

export function parseTranscriptJson(content: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputError(
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isRecord(parsed)) {
    throw new InputError(`Expected a transcript object in ${source}`);
  }
  return parsed;
}

function requireCues(cues: Cue[], source: string): Cue[] {
  if (cues.length === 0) {
    throw new InputError(`No timed cues found in ${source}`);
  }
  return cues;
}

/**
 * Read an audio or timestamped text file, choosing the reader by extension.
 */
export async function loadInput(inputPath: string, options: LoadInputOptions = {}): Promise<LoadedInput> {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new InputError(`Input file not found: ${resolved}`);
  }
  const extension = path.extname(resolved).toLowerCase();
  const gapMs = (options.gapSec ?? DEFAULT_GAP_SEC) * 1000;

  if (extension === ".wav") {
    console.info(`Decoding WAV audio from ${resolved}`);
    return { kind: "audio", path: resolved, signal: decodeWav(fs.readFileSync(resolved)) };
  }
  if (FFMPEG_EXTENSIONS.has(extension)) {
    console.info(`Decoding ${extension} audio from ${resolved} with ffmpeg`);
    return { kind: "audio", path: resolved, signal: await decodeWithFfmpeg(resolved) };
  }

  const content = fs.readFileSync(resolved, "utf-8");
  if (extension === ".srt") {
    return { kind: "text", path: resolved, cues: requireCues(parseSrt(content), resolved) };
  }
  if (extension === ".json") {
    const transcript = parseTranscriptJson(content, resolved);
    return {
      kind: "text",
      path: resolved,
      cues: requireCues(cuesFromTranscript(transcript, gapMs), resolved)
    };
  }
  if (TEXT_EXTENSIONS.has(extension)) {
    return { kind: "text", path: resolved, cues: requireCues(parseTimestampedText(content), resolved) };
  }
  throw new InputError(`Unsupported input type "${extension || "(none)"}" for ${resolved}`);
}

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FFMPEG_PATH_ENV } from "../src/env";
import { InputError, loadInput } from "../src/loader";
import { encodeWav16 } from "./helpers/audio";

const samplesDir = path.resolve(__dirname, "..", "samples");
let tmpDir: string;
let originalFfmpeg: string | undefined;

function writeTemp(name: string, content: string | Buffer): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "timing-loader-"));
  originalFfmpeg = process.env[FFMPEG_PATH_ENV];
});

afterEach(() => {
  vi.restoreAllMocks();
  if (originalFfmpeg !== undefined) {
    process.env[FFMPEG_PATH_ENV] = originalFfmpeg;
  } else {
    delete process.env[FFMPEG_PATH_ENV];
  }
});

describe("loadInput", () => {
  it("decodes WAV files", async () => {
    const wavPath = writeTemp("tone.wav", encodeWav16([0, 0.5, -0.5, 0], 8000));

    const input = await loadInput(wavPath);

    expect(input.kind).toBe("audio");
    expect(input.path).toBe(path.resolve(wavPath));
    if (input.kind === "audio") {
      expect(input.signal.sampleRate).toBe(8000);
      expect(input.signal.samples).toHaveLength(4);
    }
  });

  it("reads SubRip, JSON and timestamped text", async () => {
    const srt = await loadInput(path.join(samplesDir, "interview.srt"));
    const json = await loadInput(path.join(samplesDir, "meeting.json"));
    const log = await loadInput(path.join(samplesDir, "build.log"));

    expect(srt.kind === "text" ? srt.cues.length : 0).toBe(6);
    expect(json.kind === "text" ? json.cues.length : 0).toBe(3);
    expect(log.kind === "text" ? log.cues.length : 0).toBe(5);
  });

  it("passes the pause length on to token grouping", async () => {
    const json = await loadInput(path.join(samplesDir, "meeting.json"), { gapSec: 3 });

    expect(json.kind === "text" ? json.cues.map((cue) => cue.text) : []).toEqual([
      "Hello everyone.",
      "Hi thereSo let's begin."
    ]);
  });

  it("treats extensions case-insensitively", async () => {
    const upper = writeTemp("NOTES.TXT", "[00:01] first\n[00:04] second\n");

    const input = await loadInput(upper);

    expect(input.kind === "text" ? input.cues.map((cue) => [cue.start, cue.end]) : []).toEqual([
      [1, 4],
      [4, 5]
    ]);
  });

  it("rejects missing files", async () => {
    const missing = path.join(tmpDir, "nope.srt");
    await expect(loadInput(missing)).rejects.toThrowError(`Input file not found: ${missing}`);
  });

  it("rejects unknown file types", async () => {
    const unknown = writeTemp("data.xyz", "hello");
    await expect(loadInput(unknown)).rejects.toThrowError(InputError);
    await expect(loadInput(unknown)).rejects.toThrowError(`Unsupported input type ".xyz" for ${unknown}`);
  });

  it("rejects malformed JSON and non-object transcripts", async () => {
    const broken = writeTemp("broken.json", "{ not json");
    const list = writeTemp("list.json", "[1, 2, 3]");

    await expect(loadInput(broken)).rejects.toThrowError(/^Invalid JSON in /);
    await expect(loadInput(list)).rejects.toThrowError(`Expected a transcript object in ${list}`);
  });

  it("rejects inputs without timed cues", async () => {
    const empty = writeTemp("empty.srt", "no cues here\n");
    await expect(loadInput(empty)).rejects.toThrowError(`No timed cues found in ${empty}`);
  });

  it("reports a missing ffmpeg binary for compressed audio", async () => {
    process.env[FFMPEG_PATH_ENV] = "/nonexistent/ffmpeg";
    const mp3 = writeTemp("song.mp3", Buffer.alloc(16));

    await expect(loadInput(mp3)).rejects.toThrowError(
      new RegExp(`^Could not run /nonexistent/ffmpeg for ${mp3}`)
    );
  });
});

import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { cuesFromTranscript, parseSrt, parseTimestampedText, tokensToCues } from "../src/text/cues";
import { formatSrtTimestamp, parseTimestamp, roundTime, splitSpeaker } from "../src/text/timestamps";

const samplesDir = path.resolve(__dirname, "..", "samples");

function readSample(name: string): string {
  return fs.readFileSync(path.join(samplesDir, name), "utf-8");
}

describe("timestamps", () => {
  it("parses clock and plain second forms", () => {
    expect(parseTimestamp("00:01:02,500")).toBe(62.5);
    expect(parseTimestamp("1:02:03.25")).toBe(3723.25);
    expect(parseTimestamp("04:10")).toBe(250);
    expect(parseTimestamp("12.5")).toBe(12.5);
  });

  it("rejects malformed timestamps", () => {
    expect(() => parseTimestamp("1:2:3:4")).toThrowError("Invalid timestamp format: 1:2:3:4");
    expect(() => parseTimestamp("ab:cd")).toThrowError("Invalid timestamp format: ab:cd");
  });

  it("formats SubRip clocks", () => {
    expect(formatSrtTimestamp(0)).toBe("00:00:00,000");
    expect(formatSrtTimestamp(3723045)).toBe("01:02:03,045");
    expect(formatSrtTimestamp(-5)).toBe("00:00:00,000");
  });

  it("rounds to milliseconds", () => {
    expect(roundTime(1.23456)).toBe(1.235);
    expect(roundTime(0.1 + 0.2)).toBe(0.3);
  });

  it("splits named and bracketed speakers", () => {
    expect(splitSpeaker("Alice: hello there")).toEqual({ speaker: "Alice", text: "hello there" });
    expect(splitSpeaker("[Host] welcome back")).toEqual({ speaker: "Host", text: "welcome back" });
    expect(splitSpeaker("Speaker 2: right")).toEqual({ speaker: "Speaker 2", text: "right" });
    expect(splitSpeaker("note: lowercase is not a speaker")).toEqual({
      speaker: null,
      text: "note: lowercase is not a speaker"
    });
  });
});

describe("parseSrt", () => {
  it("reads cues with speakers and joins continuation lines", () => {
    const cues = parseSrt(readSample("interview.srt"));

    expect(cues).toHaveLength(6);
    expect(cues[0]).toEqual({ start: 0, end: 3, text: "Welcome to the show.", speaker: "Alice" });
    expect(cues[3]).toEqual({
      start: 10.3,
      end: 14,
      text: "Let us start with the basics.",
      speaker: "Bob"
    });
    expect(cues.map((cue) => cue.speaker)).toEqual(["Alice", "Alice", "Bob", "Bob", "Alice", "Alice"]);
  });

  it("tolerates CRLF, a byte order mark and blocks without timing", () => {
    const content = "\uFEFF1\r\n00:00:01,000 --> 00:00:02,000\r\nhello\r\n\r\nstray block\r\n\r\n2\r\n00:00:03,000 --> 00:00:04,500\r\nworld\r\n";
    expect(parseSrt(content)).toEqual([
      { start: 1, end: 2, text: "hello", speaker: null },
      { start: 3, end: 4.5, text: "world", speaker: null }
    ]);
  });
});

describe("parseTimestampedText", () => {
  it("ends each line at the next timestamp and appends continuation lines", () => {
    expect(parseTimestampedText(readSample("build.log"))).toEqual([
      { start: 0, end: 5, text: "Build started", speaker: null },
      { start: 5, end: 90, text: "Installing dependencies", speaker: null },
      { start: 90, end: 105, text: "Compiling sources", speaker: null },
      { start: 105, end: 250, text: "Running tests integration suite included", speaker: null },
      { start: 250, end: 251, text: "Deploy", speaker: null }
    ]);
  });

  it("estimates the length of the last line from its words", () => {
    const cues = parseTimestampedText("0:10 - Host: one two three four five six seven eight nine ten");
    expect(cues).toEqual([
      { start: 10, end: 14, text: "one two three four five six seven eight nine ten", speaker: "Host" }
    ]);
  });
});

describe("tokensToCues", () => {
  it("splits on sentence ends, speaker changes and gaps", () => {
    const transcript = JSON.parse(readSample("meeting.json"));
    expect(cuesFromTranscript(transcript, 1200)).toEqual([
      { start: 0, end: 0.95, text: "Hello everyone.", speaker: "Speaker 1" },
      { start: 1.2, end: 1.9, text: "Hi there", speaker: "Speaker 2" },
      { start: 4, end: 5.1, text: "So let's begin.", speaker: "Speaker 2" }
    ]);
  });

  it("keeps going across short gaps", () => {
    const cues = tokensToCues(
      [
        { text: "one", start_ms: 0, end_ms: 300 },
        { text: " two", start_ms: 800, end_ms: 1000 },
        { text: " three", start_ms: 3000, end_ms: 3200 }
      ],
      1200
    );
    expect(cues).toEqual([
      { start: 0, end: 1, text: "one two", speaker: null },
      { start: 3, end: 3.2, text: "three", speaker: null }
    ]);
  });

  it("finds tokens nested under result objects", () => {
    const cues = cuesFromTranscript(
      { results: [{ alternatives: [{ tokens: [{ text: "Hi.", start_ms: 500, end_ms: 900, speaker: "A" }] }] }] },
      1200
    );
    expect(cues).toEqual([{ start: 0.5, end: 0.9, text: "Hi.", speaker: "A" }]);
  });
});

describe("cuesFromTranscript", () => {
  it("prefers second-based segments", () => {
    const transcript = JSON.parse(readSample("lecture.json"));
    expect(cuesFromTranscript(transcript, 1200)).toEqual([
      { start: 0, end: 4.5, text: "Today we cover sorting algorithms and their costs.", speaker: null },
      { start: 4.8, end: 9, text: "First, insertion sort.", speaker: null },
      { start: 15, end: 21, text: "Questions?", speaker: "Student" }
    ]);
  });

  it("takes a speaker prefix from segment text", () => {
    expect(cuesFromTranscript({ segments: [{ start: 1, end: 2, text: "Bob: ok" }] }, 1200)).toEqual([
      { start: 1, end: 2, text: "ok", speaker: "Bob" }
    ]);
  });

  it("returns nothing for an object without tokens or segments", () => {
    expect(cuesFromTranscript({ text: "no timing" }, 1200)).toEqual([]);
  });
});

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { analyzeFile, analyzeToReports } from "../src/analyzer";
import { AnalysisConfig } from "../src/config";
import { Transcript } from "../src/types";
import { CLICK_COUNT, CLICK_SAMPLE_RATE, clickTrack, encodeWav16 } from "./helpers/audio";
import { DummySpeechClient } from "./helpers/speech";

const samplesDir = path.resolve(__dirname, "..", "samples");
const meeting: Transcript = JSON.parse(fs.readFileSync(path.join(samplesDir, "meeting.json"), "utf-8"));
let tmpDir: string;

function writeClickTrack(): string {
  const wavPath = path.join(tmpDir, "clicks.wav");
  fs.writeFileSync(wavPath, encodeWav16(clickTrack(), CLICK_SAMPLE_RATE));
  return wavPath;
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "timing-analyze-"));
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("analyzeFile", () => {
  it("analyzes audio by harmony and energy", async () => {
    const report = await analyzeFile(writeClickTrack());

    expect(report.source).toBe("clicks.wav");
    expect(report.input_kind).toBe("audio");
    expect(report.duration).toBe(12.074);
    expect(report.audio?.tempo).toBe(129.2);
    expect(report.audio?.beat_count).toBe(CLICK_COUNT);
    expect(report.audio?.beat_times).toBeUndefined();
    expect(report.sections).toHaveLength(10);
    expect(report.sections[0].start).toBe(0);
    expect(report.sections[9].end).toBeCloseTo(12.074, 3);
    expect(report.dialogue).toBeUndefined();
  });

  it("follows the configured section count", async () => {
    const report = await analyzeFile(writeClickTrack(), {
      config: new AnalysisConfig({ sectionCount: 3 }),
      detailed: true
    });

    expect(report.sections).toHaveLength(3);
    expect(report.audio?.beat_times).toHaveLength(CLICK_COUNT);
    expect(report.audio?.rms_per_second).toHaveLength(13);
  });

  it("segments transcribed audio by dialogue", async () => {
    const client = new DummySpeechClient(meeting);

    const report = await analyzeFile(writeClickTrack(), {
      transcribe: true,
      transcribeOptions: { client }
    });

    expect(client.uploadedPath).toBe(path.join(tmpDir, "clicks.wav"));
    expect(report.input_kind).toBe("audio");
    expect(report.duration).toBe(12.074);
    expect(report.sections[0].subsections.map((sub) => [sub.id, sub.label])).toEqual([
      ["1.1", "Speaker 1"],
      ["1.2", "Speaker 2"],
      ["1.3", "Speaker 2"]
    ]);
    expect(report.transitions.map((transition) => transition.kind)).toEqual(["speaker-change", "pause"]);
    expect(report.dialogue?.cue_count).toBe(3);
  });

  it("analyzes a transcript by its cues", async () => {
    const report = await analyzeFile(path.join(samplesDir, "lecture.json"), {
      generatedAt: new Date("2024-05-06T07:08:09Z")
    });

    expect(report.source).toBe("lecture.json");
    expect(report.input_kind).toBe("text");
    expect(report.generated_at).toBe("2024-05-06T07:08:09.000Z");
    expect(report.duration).toBe(21);
    expect(report.sections.map((section) => [section.start, section.end, section.share])).toEqual([
      [0, 9, 0.4286],
      [15, 21, 0.2857]
    ]);
    expect(report.sections.map((section) => section.subsections.map((sub) => sub.label))).toEqual([
      ["Today we cover sorting algorithms and…"],
      ["Student"]
    ]);
    expect(report.transitions).toEqual([
      { time: 15, kind: "section-break", from: "1.1", to: "2.1", strength: 6 }
    ]);
  });

  it("analyzes a very long timestamped log", async () => {
    const lines = Array.from({ length: 150_000 }, (_, second) => {
      const hours = Math.floor(second / 3600);
      const minutes = Math.floor(second / 60) % 60;
      const pad = (value: number) => value.toString().padStart(2, "0");
      return `[${pad(hours)}:${pad(minutes)}:${pad(second % 60)}] step ${second}`;
    });
    const logPath = path.join(tmpDir, "soak.log");
    fs.writeFileSync(logPath, lines.join("\n"));

    const report = await analyzeFile(logPath);

    expect(report.duration).toBe(150_000);
    expect(report.sections).toHaveLength(1);
    expect(report.sections[0].subsections).toHaveLength(2500);
    expect(report.sections[0].end).toBe(150_000);
  });
});

describe("analyzeToReports", () => {
  it("writes the report files for an input", async () => {
    const outputDir = path.join(tmpDir, "reports");

    const { report, written } = await analyzeToReports(path.join(samplesDir, "build.log"), {
      outputDir,
      srt: true
    });

    expect(report.sections[0].subsections).toHaveLength(5);
    expect(written?.jsonPath).toBe(path.join(outputDir, "build.timing.json"));
    expect(fs.existsSync(path.join(outputDir, "build.timing.txt"))).toBe(true);
    expect(fs.readFileSync(path.join(outputDir, "build.sections.srt"), "utf-8").split("\n").slice(0, 4)).toEqual([
      "1",
      "00:00:00,000 --> 00:00:05,000",
      "Section 1 · 1.1",
      "Build started"
    ]);
  });

  it("charts beats of audio input", async () => {
    const outputDir = path.join(tmpDir, "reports");

    const { features, written } = await analyzeToReports(writeClickTrack(), { outputDir, visualize: true });

    expect(features?.beatTimes).toHaveLength(CLICK_COUNT);
    expect(written?.svgPath).toBe(path.join(outputDir, "clicks.timing.svg"));
    const svg = fs.readFileSync(path.join(outputDir, "clicks.timing.svg"), "utf-8");
    expect(svg.match(/class="beat"/g)).toHaveLength(CLICK_COUNT);
    expect(svg.match(/class="section"/g)).toHaveLength(10);
  });
});

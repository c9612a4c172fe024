import fs from "node:fs";
import path from "node:path";

import { formatSrtTimestamp, roundTime } from "./text/timestamps";
import {
  AudioFeatures,
  AudioSummary,
  Cue,
  Detection,
  DialogueSummary,
  ReportMode,
  ReportSummary,
  Section,
  SpeakerShare,
  SubtitleEntry,
  TimingReport
} from "./types";
import { renderTimingSvg } from "./visualize";

export const UNLABELLED_SPEAKER = "(unlabelled)";
const LONGEST_SUBSECTIONS = 3;

function summarize(sections: Section[]): ReportSummary {
  const subsections = sections.flatMap((section) => section.subsections);
  const total = sections.reduce((acc, section) => acc + section.duration, 0);
  const longestSection = sections.reduce<Section | undefined>(
    (longest, section) => (!longest || section.duration > longest.duration ? section : longest),
    undefined
  );
  return {
    section_count: sections.length,
    subsection_count: subsections.length,
    average_section_duration: sections.length > 0 ? roundTime(total / sections.length) : 0,
    longest_section: longestSection
      ? { title: longestSection.title, duration: longestSection.duration }
      : null,
    longest_subsections: [...subsections]
      .sort((a, b) => b.duration - a.duration || a.start - b.start)
      .slice(0, LONGEST_SUBSECTIONS)
      .map((sub) => ({ id: sub.id, label: sub.label, duration: sub.duration }))
  };
}

export function summarizeAudio(features: AudioFeatures, mode: ReportMode): AudioSummary {
  const summary: AudioSummary = {
    sample_rate: features.sampleRate,
    tempo: Math.round(features.tempo * 10) / 10,
    beat_count: features.beatTimes.length,
    energy_peaks: features.energyPeaks.map((time) => roundTime(time))
  };
  if (mode === "detailed") {
    summary.beat_times = features.beatTimes.map((time) => roundTime(time));
    summary.onset_times = features.onsetTimes.map((time) => roundTime(time));
    summary.rms_per_second = features.rmsPerSecond.map((value) => roundTime(value, 6));
  }
  return summary;
}

export function summarizeDialogue(cues: Cue[]): DialogueSummary {
  const totals = new Map<string, number>();
  for (const cue of cues) {
    const speaker = cue.speaker || UNLABELLED_SPEAKER;
    totals.set(speaker, (totals.get(speaker) ?? 0) + Math.max(0, cue.end - cue.start));
  }
  const spoken = [...totals.values()].reduce((acc, value) => acc + value, 0);
  const speakers: SpeakerShare[] = [...totals.entries()]
    .map(([speaker, time]) => ({
      speaker,
      speaking_time: roundTime(time),
      share: spoken > 0 ? Math.round((time / spoken) * 10000) / 10000 : 0
    }))
    .sort((a, b) => b.speaking_time - a.speaking_time || a.speaker.localeCompare(b.speaker));
  return { cue_count: cues.length, speakers };
}

export interface BuildReportOptions {
  source: string;
  mode: ReportMode;
  duration: number;
  detection: Detection;
  audio?: AudioFeatures;
  cues?: Cue[];
  generatedAt?: Date;
}

export function buildReport(options: BuildReportOptions): TimingReport {
  const { source, mode, duration, detection, audio, cues } = options;
  const sections =
    mode === "detailed"
      ? detection.sections
      : detection.sections.map((section) => ({
          ...section,
          subsections: section.subsections.map(({ text: _text, ...rest }) => rest)
        }));

  const report: TimingReport = {
    source,
    input_kind: audio ? "audio" : "text",
    mode,
    generated_at: (options.generatedAt ?? new Date()).toISOString(),
    duration: roundTime(duration),
    sections,
    transitions: detection.transitions,
    summary: summarize(sections)
  };
  if (audio) {
    report.audio = summarizeAudio(audio, mode);
  }
  if (cues) {
    report.dialogue = summarizeDialogue(cues);
  }
  return report;
}

function formatDurationWords(duration: number): string {
  const totalSeconds = Math.round(duration);
  return `${Math.floor(totalSeconds / 60)} minutes and ${totalSeconds % 60} seconds`;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Plain-text description of the report, meant to be pasted into an
 * assistant chat as timing context.
 */
export function renderTimingPrompt(report: TimingReport): string {
  const lines: string[] = [];
  const noun = report.input_kind === "audio" ? "recording" : "transcript";

  if (report.audio) {
    lines.push(
      `This ${noun} has a tempo of approximately ${report.audio.tempo.toFixed(1)} BPM (beats per minute).`
    );
    lines.push(`It has a duration of ${formatDurationWords(report.duration)}.`);
    lines.push("");
    lines.push(`The ${noun} contains ${report.audio.beat_count} beats.`);
  } else {
    lines.push(`This ${noun} has a duration of ${formatDurationWords(report.duration)}.`);
    if (report.dialogue) {
      const named = report.dialogue.speakers.filter((entry) => entry.speaker !== UNLABELLED_SPEAKER);
      lines.push(`It contains ${report.dialogue.cue_count} cues from ${named.length} speakers.`);
    }
    lines.push("");
  }

  const basis = report.dialogue ? "pauses and dialogue changes" : "harmonic changes";
  lines.push(
    `The ${noun} can be divided into ${report.sections.length} distinct sections based on ${basis}.`
  );
  lines.push("Key timing markers (in seconds):");
  report.sections.forEach((section, index) => {
    if (index > 0) {
      lines.push(`- Section change at: ${section.start.toFixed(2)}`);
    } else {
      lines.push(`- Start: ${section.start === 0 ? "0.0" : section.start.toFixed(2)}`);
    }
  });

  lines.push("");
  lines.push("Sections and subsections:");
  for (const section of report.sections) {
    lines.push(
      `${section.title} (${section.start.toFixed(2)}s - ${section.end.toFixed(2)}s, ${percent(section.share)})`
    );
    for (const sub of section.subsections) {
      lines.push(`  - ${sub.id} ${sub.label} (${sub.start.toFixed(2)}s - ${sub.end.toFixed(2)}s)`);
    }
  }

  if (report.audio && report.audio.energy_peaks.length > 0) {
    lines.push("");
    lines.push("Significant dynamic changes (potential chorus/drop sections):");
    for (const peak of report.audio.energy_peaks) {
      lines.push(`- Energy peak at: ${peak.toFixed(2)} seconds`);
    }
  }

  if (report.dialogue && report.dialogue.speakers.length > 0) {
    lines.push("");
    lines.push("Speaking time per speaker:");
    for (const entry of report.dialogue.speakers) {
      lines.push(`- ${entry.speaker}: ${entry.speaking_time.toFixed(2)} seconds (${percent(entry.share)})`);
    }
  }

  if (report.summary.longest_subsections.length > 0) {
    lines.push("");
    lines.push("Longest subsections:");
    for (const sub of report.summary.longest_subsections) {
      lines.push(`- ${sub.id} ${sub.label} (${sub.duration.toFixed(2)}s)`);
    }
  }

  if (report.mode === "detailed") {
    if (report.transitions.length > 0) {
      lines.push("");
      lines.push("Transitions:");
      for (const transition of report.transitions) {
        lines.push(
          `- ${transition.time.toFixed(2)}s ${transition.kind} (${transition.from} -> ${transition.to})`
        );
      }
    }
    if (report.audio?.rms_per_second) {
      lines.push("");
      lines.push("Detailed RMS Energy Analysis (second by second):");
      report.audio.rms_per_second.forEach((value, second) => {
        lines.push(`- Second ${second}: RMS Energy = ${value.toFixed(6)}`);
      });
    }
    const texts = report.sections.flatMap((section) => section.subsections).filter((sub) => sub.text);
    if (texts.length > 0) {
      lines.push("");
      lines.push("Subsection text:");
      for (const sub of texts) {
        lines.push(`- ${sub.id}: ${sub.text}`);
      }
    }
  }

  return `${lines.join("\n")}\n`;
}

export function sectionsToSubtitleEntries(sections: Section[]): SubtitleEntry[] {
  return sections
    .flatMap((section) =>
      section.subsections.map((sub) => ({
        start_ms: Math.round(sub.start * 1000),
        end_ms: Math.round(sub.end * 1000),
        lines: [`${section.title} · ${sub.id}`, sub.label]
      }))
    )
    .map((entry, index) => ({ index: index + 1, ...entry }));
}

export function renderSrt(entries: SubtitleEntry[]): string {
  const chunks: string[] = [];
  for (const entry of entries) {
    chunks.push(`${entry.index}`);
    chunks.push(`${formatSrtTimestamp(entry.start_ms)} --> ${formatSrtTimestamp(entry.end_ms)}`);
    for (const line of entry.lines) {
      chunks.push(line);
    }
    chunks.push("");
  }
  return `${chunks.join("\n")}\n`;
}

export interface WriteReportOptions {
  outputDir: string;
  srt?: boolean;
  /** Also write an SVG timeline. */
  visualize?: boolean;
  /** Audio features drawn into the SVG timeline. */
  features?: AudioFeatures;
}

export interface WrittenReport {
  jsonPath: string;
  promptPath: string;
  srtPath?: string;
  svgPath?: string;
}

export function reportBaseName(source: string): string {
  return path.basename(source, path.extname(source)) || "report";
}

export function writeReport(report: TimingReport, options: WriteReportOptions): WrittenReport {
  const outputDir = path.resolve(options.outputDir);
  fs.mkdirSync(outputDir, { recursive: true });
  const base = reportBaseName(report.source);

  const jsonPath = path.join(outputDir, `${base}.timing.json`);
  console.info(`Writing report JSON to ${jsonPath}`);
  fs.writeFileSync(jsonPath, `${JSON.stringify(report, null, 2)}\n`, { encoding: "utf-8" });

  const promptPath = path.join(outputDir, `${base}.timing.txt`);
  console.info(`Writing timing prompt to ${promptPath}`);
  fs.writeFileSync(promptPath, renderTimingPrompt(report), { encoding: "utf-8" });

  const written: WrittenReport = { jsonPath, promptPath };
  if (options.srt) {
    const srtPath = path.join(outputDir, `${base}.sections.srt`);
    const entries = sectionsToSubtitleEntries(report.sections);
    console.info(`Writing ${entries.length} section cues to ${srtPath}`);
    fs.writeFileSync(srtPath, renderSrt(entries), { encoding: "utf-8" });
    written.srtPath = srtPath;
  }
  if (options.visualize) {
    const svgPath = path.join(outputDir, `${base}.timing.svg`);
    console.info(`Writing timing chart to ${svgPath}`);
    fs.writeFileSync(svgPath, renderTimingSvg(report, options.features), { encoding: "utf-8" });
    written.svgPath = svgPath;
  }
  return written;
}

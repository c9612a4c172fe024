import path from "node:path";

import { extractFeatures } from "./audio/features";
import { AnalysisConfig } from "./config";
import { detectAudioSections, detectDialogueSections, latestEnd } from "./detector";
import { loadInput } from "./loader";
import { buildReport, writeReport, WrittenReport } from "./report";
import { cuesFromTranscript } from "./text/cues";
import { TranscribeOptions, transcribeAudioFile } from "./transcriber";
import { AudioFeatures, Cue, Detection, ReportMode, TimingReport } from "./types";

export interface AnalyzeOptions {
  detailed?: boolean;
  config?: AnalysisConfig;
  /** Transcribe audio input and segment it by dialogue instead of harmony. */
  transcribe?: boolean;
  transcribeOptions?: TranscribeOptions;
  generatedAt?: Date;
}

export interface AnalyzeResult {
  report: TimingReport;
  /** Features of audio input, for charts. */
  features?: AudioFeatures;
  written?: WrittenReport;
}

/**
 * Load, detect and assemble the report for one input file.
 */
export async function analyzeFile(inputPath: string, options: AnalyzeOptions = {}): Promise<TimingReport> {
  return (await analyze(inputPath, options)).report;
}

export async function analyze(inputPath: string, options: AnalyzeOptions = {}): Promise<AnalyzeResult> {
  const config = options.config ?? new AnalysisConfig();
  const mode: ReportMode = options.detailed ? "detailed" : "basic";
  const input = await loadInput(inputPath, { gapSec: config.gap_sec });
  const source = path.basename(input.path);

  let detection: Detection;
  let duration: number;
  let audio: AudioFeatures | undefined;
  let cues: Cue[] | undefined;

  if (input.kind === "audio") {
    console.info(
      `Extracting features from ${input.signal.samples.length} samples at ${input.signal.sampleRate} Hz`
    );
    audio = extractFeatures(input.signal, config);
    duration = audio.duration;
    if (options.transcribe) {
      const transcript = await transcribeAudioFile(input.path, options.transcribeOptions);
      cues = cuesFromTranscript(transcript, config.gap_sec * 1000);
      detection = detectDialogueSections(cues, config, duration);
    } else {
      detection = detectAudioSections(audio, config);
    }
  } else {
    cues = input.cues;
    duration = latestEnd(cues);
    detection = detectDialogueSections(cues, config, duration);
  }

  console.info(
    `Detected ${detection.sections.length} sections and ${detection.transitions.length} transitions in ${source}`
  );
  const report = buildReport({
    source,
    mode,
    duration,
    detection,
    audio,
    cues,
    generatedAt: options.generatedAt
  });
  return audio ? { report, features: audio } : { report };
}

export async function analyzeToReports(
  inputPath: string,
  options: AnalyzeOptions & { outputDir: string; srt?: boolean; visualize?: boolean }
): Promise<AnalyzeResult> {
  const result = await analyze(inputPath, options);
  const written = writeReport(result.report, {
    outputDir: options.outputDir,
    srt: options.srt,
    visualize: options.visualize,
    features: result.features
  });
  return { ...result, written };
}

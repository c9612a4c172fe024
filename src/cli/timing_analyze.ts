#!/usr/bin/env node
import { Command, CommanderError } from "commander";

import { analyze } from "../analyzer";
import { DEFAULT_STT_BASE_URL, DEFAULT_STT_MODEL } from "../api";
import {
  AnalysisConfig,
  DEFAULT_GAP_SEC,
  DEFAULT_MAX_SUBSECTION_SEC,
  DEFAULT_MIN_SUBSECTION_SEC,
  DEFAULT_PEAK_DISTANCE_SEC,
  DEFAULT_RISE_RATIO,
  DEFAULT_SECTION_COUNT,
  DEFAULT_SECTION_GAP_SEC
} from "../config";
import { resolveReportsDir } from "../env";
import { renderTimingPrompt, writeReport } from "../report";

interface CliOptions {
  detailed: boolean;
  outputDir?: string;
  save: boolean;
  srt: boolean;
  visualize: boolean;
  sections: number;
  gap: number;
  sectionGap: number;
  maxSubsection: number;
  riseRatio: number;
  minSubsection: number;
  peakDistance: number;
  transcribe: boolean;
  model: string;
  baseUrl: string;
  quiet: boolean;
}

function buildCommand(): Command {
  const program = new Command();
  program
    .name("timing-analyze")
    .description("Break an audio or timestamped text file into timed sections and write a timing report.")
    .argument("[path]", "Audio (.wav, .mp3, ...) or text (.srt, .json, .txt) file to analyze")
    .option("--detailed", "Exhaustive analysis: beat and onset times, per-second energy, cue text", false)
    .option("-o, --output-dir <dir>", "Reports directory (default: $TIMING_REPORTS_DIR or ./reports)")
    .option("--no-save", "Print the analysis without writing report files")
    .option("--srt", "Also write the sections as a SubRip file", false)
    .option("--visualize", "Also write an SVG timeline of sections, beats and energy", false)
    .option(
      "-k, --sections <n>",
      "Target number of audio sections",
      (value) => parseInt(value, 10),
      DEFAULT_SECTION_COUNT
    )
    .option(
      "--gap <sec>",
      "Pause in dialogue that starts a new subsection",
      (value) => parseFloat(value),
      DEFAULT_GAP_SEC
    )
    .option(
      "--section-gap <sec>",
      "Pause in dialogue that starts a new section",
      (value) => parseFloat(value),
      DEFAULT_SECTION_GAP_SEC
    )
    .option(
      "--max-subsection <sec>",
      "Longest dialogue subsection before it is split",
      (value) => parseFloat(value),
      DEFAULT_MAX_SUBSECTION_SEC
    )
    .option(
      "--rise-ratio <ratio>",
      "Energy change between half-second blocks that marks a transition",
      (value) => parseFloat(value),
      DEFAULT_RISE_RATIO
    )
    .option(
      "--min-subsection <sec>",
      "Shortest audio subsection",
      (value) => parseFloat(value),
      DEFAULT_MIN_SUBSECTION_SEC
    )
    .option(
      "--peak-distance <sec>",
      "Minimum spacing between reported energy peaks",
      (value) => parseFloat(value),
      DEFAULT_PEAK_DISTANCE_SEC
    )
    .option("--transcribe", "Transcribe audio and segment it by dialogue", false)
    .option("--model <name>", "Speech-to-text model", DEFAULT_STT_MODEL)
    .option("--base-url <url>", "Speech-to-text API base URL", DEFAULT_STT_BASE_URL)
    .option("-q, --quiet", "Do not print the timing prompt", false);
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    program.parse(argv);
    const options = program.opts<CliOptions>();
    const inputPath = program.args[0];
    if (!inputPath) {
      throw new Error("No input path given. Usage: timing-analyze [--detailed] <path>");
    }

    const config = new AnalysisConfig({
      sectionCount: options.sections,
      gapSec: options.gap,
      sectionGapSec: options.sectionGap,
      maxSubsectionSec: options.maxSubsection,
      riseRatio: options.riseRatio,
      minSubsectionSec: options.minSubsection,
      peakDistanceSec: options.peakDistance
    });

    const { report, features } = await analyze(inputPath, {
      detailed: options.detailed,
      config,
      transcribe: options.transcribe,
      transcribeOptions: { model: options.model, baseUrl: options.baseUrl }
    });

    if (!options.quiet) {
      process.stdout.write(`\n=== TIMING ANALYSIS ===\n\n${renderTimingPrompt(report)}`);
    }
    if (options.save) {
      const written = writeReport(report, {
        outputDir: resolveReportsDir(options.outputDir),
        srt: options.srt,
        visualize: options.visualize,
        features
      });
      console.info(`Analysis saved to ${written.jsonPath}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === "commander.helpDisplayed" || error.code === "commander.version" ? 0 : 1;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => process.exit(code),
    (error) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export default main;

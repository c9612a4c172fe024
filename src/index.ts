export { analyze, analyzeFile, analyzeToReports } from "./analyzer";
export type { AnalyzeOptions, AnalyzeResult } from "./analyzer";

export {
  AnalysisConfig,
  DEFAULT_SECTION_COUNT,
  DEFAULT_GAP_SEC,
  DEFAULT_SECTION_GAP_SEC,
  DEFAULT_MAX_SUBSECTION_SEC,
  DEFAULT_RISE_RATIO,
  DEFAULT_MIN_SUBSECTION_SEC,
  DEFAULT_PEAK_DISTANCE_SEC
} from "./config";

export { InputError, loadInput } from "./loader";
export { AudioDecodeError, decodeWav } from "./audio/wav";
export { decodeWithFfmpeg } from "./audio/ffmpeg";
export {
  computeRms,
  computeSpectralFeatures,
  estimateTempo,
  extractFeatures,
  findPeaks,
  pickOnsets,
  rmsPerSecond,
  trackBeats
} from "./audio/features";
export { agglomerate } from "./audio/segmentation";

export { cuesFromTranscript, parseSrt, parseTimestampedText, tokensToCues } from "./text/cues";
export { detectAudioSections, detectDialogueSections, energyChanges, latestEnd } from "./detector";
export {
  buildReport,
  renderSrt,
  renderTimingPrompt,
  sectionsToSubtitleEntries,
  writeReport
} from "./report";

export {
  DEFAULT_STT_BASE_URL,
  DEFAULT_STT_MODEL,
  SpeechApiError,
  SpeechClient,
  requireApiKey
} from "./api";
export type { SpeechApi } from "./api";
export { transcribeAudioFile } from "./transcriber";

export type {
  AudioFeatures,
  AudioSignal,
  Cue,
  Section,
  Subsection,
  TimingReport,
  Token,
  Transcript,
  Transition,
  TransitionKind
} from "./types";
export { envelopeColumns, escapeXml, renderTimingSvg } from "./visualize";

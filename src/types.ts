export interface Token {
  text?: string;
  start_ms?: number;
  end_ms?: number;
  confidence?: number;
  speaker?: string | null;
  language?: string | null;
  [key: string]: unknown;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
  speaker?: string | null;
}

export interface Transcript {
  id?: string;
  text?: string;
  tokens?: Token[];
  segments?: TranscriptSegment[];
  [key: string]: unknown;
}

export interface Cue {
  start: number;
  end: number;
  text: string;
  speaker?: string | null;
}

export interface AudioSignal {
  sampleRate: number;
  samples: Float32Array;
  channels: number;
}

export type LoadedInput =
  | { kind: "audio"; path: string; signal: AudioSignal }
  | { kind: "text"; path: string; cues: Cue[] };

export type TransitionKind =
  | "harmonic"
  | "energy-rise"
  | "energy-fall"
  | "speaker-change"
  | "pause"
  | "section-break"
  | "max-length";

export interface Subsection {
  id: string;
  label: string;
  start: number;
  end: number;
  duration: number;
  speaker?: string | null;
  text?: string;
}

export interface Section {
  index: number;
  title: string;
  start: number;
  end: number;
  duration: number;
  share: number;
  subsections: Subsection[];
}

export interface Transition {
  time: number;
  kind: TransitionKind;
  from: string;
  to: string;
  strength?: number;
}

export interface Detection {
  sections: Section[];
  transitions: Transition[];
}

export interface AudioFeatures {
  sampleRate: number;
  hopLength: number;
  duration: number;
  tempo: number;
  beatTimes: number[];
  onsetTimes: number[];
  segmentTimes: number[];
  rms: Float32Array;
  rmsTimes: number[];
  energyPeaks: number[];
  rmsPerSecond: number[];
  chroma: Float32Array[];
}

export interface AudioSummary {
  sample_rate: number;
  tempo: number;
  beat_count: number;
  energy_peaks: number[];
  beat_times?: number[];
  onset_times?: number[];
  rms_per_second?: number[];
}

export interface SpeakerShare {
  speaker: string;
  speaking_time: number;
  share: number;
}

export interface DialogueSummary {
  cue_count: number;
  speakers: SpeakerShare[];
}

export interface ReportSummary {
  section_count: number;
  subsection_count: number;
  average_section_duration: number;
  longest_section: { title: string; duration: number } | null;
  longest_subsections: { id: string; label: string; duration: number }[];
}

export type ReportMode = "basic" | "detailed";

export interface TimingReport {
  source: string;
  input_kind: "audio" | "text";
  mode: ReportMode;
  generated_at: string;
  duration: number;
  sections: Section[];
  transitions: Transition[];
  summary: ReportSummary;
  audio?: AudioSummary;
  dialogue?: DialogueSummary;
}

export interface SubtitleEntry {
  index: number;
  start_ms: number;
  end_ms: number;
  lines: string[];
}

export interface AnalysisConfigOptions {
  sectionCount?: number;
  gapSec?: number;
  sectionGapSec?: number;
  maxSubsectionSec?: number;
  riseRatio?: number;
  minSubsectionSec?: number;
  peakDistanceSec?: number;
}

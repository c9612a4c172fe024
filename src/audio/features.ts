/**
 * Frame-level audio features: loudness, onsets, tempo, beats and chroma.
 *
 * Everything here is a pure function over sample or envelope arrays so it
 * can be tested on synthetic signals.
 */

import { AnalysisConfig } from "../config";
import { AudioFeatures, AudioSignal } from "../types";
import { hannWindow, magnitudeSpectrum } from "./fft";
import { agglomerativeBoundaries, poolFrames } from "./segmentation";

export const FRAME_LENGTH = 2048;
export const HOP_LENGTH = 512;

const CHROMA_MIN_HZ = 32.7;
const CHROMA_MAX_HZ = 4186;
const TEMPO_MIN_BPM = 30;
const TEMPO_MAX_BPM = 300;
const TEMPO_PRIOR_BPM = 120;
const BEAT_TIGHTNESS = 100;
const PEAK_HEIGHT_FACTOR = 1.2;
const SECTION_BLOCK_SEC = 0.5;

export function frameCount(sampleCount: number, hopLength = HOP_LENGTH): number {
  return 1 + Math.floor(sampleCount / hopLength);
}

/** Frame `index` centered on sample `index * hop`, zero padded at both ends. */
export function frameAt(
  samples: Float32Array,
  index: number,
  frameLength = FRAME_LENGTH,
  hopLength = HOP_LENGTH
): Float64Array {
  const frame = new Float64Array(frameLength);
  const start = index * hopLength - Math.floor(frameLength / 2);
  const from = Math.max(0, start);
  const to = Math.min(samples.length, start + frameLength);
  for (let i = from; i < to; i++) {
    frame[i - start] = samples[i];
  }
  return frame;
}

export function framesToTimes(
  frames: number[],
  sampleRate: number,
  hopLength = HOP_LENGTH
): number[] {
  return frames.map((frame) => (frame * hopLength) / sampleRate);
}

export function computeRms(
  samples: Float32Array,
  frameLength = FRAME_LENGTH,
  hopLength = HOP_LENGTH
): Float32Array {
  const count = frameCount(samples.length, hopLength);
  const rms = new Float32Array(count);
  for (let t = 0; t < count; t++) {
    const frame = frameAt(samples, t, frameLength, hopLength);
    let sum = 0;
    for (let i = 0; i < frame.length; i++) {
      sum += frame[i] * frame[i];
    }
    rms[t] = Math.sqrt(sum / frameLength);
  }
  return rms;
}

export interface SpectralFeatures {
  onsetEnvelope: Float64Array;
  chroma: Float32Array[];
}

function pitchClassOfBin(bin: number, sampleRate: number, frameLength: number): number {
  const freq = (bin * sampleRate) / frameLength;
  if (freq < CHROMA_MIN_HZ || freq > CHROMA_MAX_HZ) {
    return -1;
  }
  const midi = Math.round(69 + 12 * Math.log2(freq / 440));
  return ((midi % 12) + 12) % 12;
}

/**
 * One STFT pass producing the spectral-flux onset envelope and the chroma
 * frames.
 */
export function computeSpectralFeatures(
  samples: Float32Array,
  sampleRate: number,
  frameLength = FRAME_LENGTH,
  hopLength = HOP_LENGTH
): SpectralFeatures {
  const count = frameCount(samples.length, hopLength);
  const window = hannWindow(frameLength);
  const bins = frameLength / 2 + 1;
  const pitchClasses = Array.from({ length: bins }, (_, k) =>
    pitchClassOfBin(k, sampleRate, frameLength)
  );

  const onsetEnvelope = new Float64Array(count);
  const chroma: Float32Array[] = [];
  let previousLog: Float64Array | undefined;

  for (let t = 0; t < count; t++) {
    const frame = frameAt(samples, t, frameLength, hopLength);
    for (let i = 0; i < frameLength; i++) {
      frame[i] *= window[i];
    }
    const magnitudes = magnitudeSpectrum(frame);

    const logMagnitudes = new Float64Array(bins);
    for (let k = 0; k < bins; k++) {
      logMagnitudes[k] = Math.log1p(magnitudes[k]);
    }
    if (previousLog) {
      let flux = 0;
      for (let k = 0; k < bins; k++) {
        const diff = logMagnitudes[k] - previousLog[k];
        if (diff > 0) {
          flux += diff;
        }
      }
      onsetEnvelope[t] = flux / bins;
    }
    previousLog = logMagnitudes;

    const pitch = new Float32Array(12);
    for (let k = 0; k < bins; k++) {
      const pc = pitchClasses[k];
      if (pc >= 0) {
        pitch[pc] += magnitudes[k] * magnitudes[k];
      }
    }
    let max = 0;
    for (let pc = 0; pc < 12; pc++) {
      max = Math.max(max, pitch[pc]);
    }
    if (max > 0) {
      for (let pc = 0; pc < 12; pc++) {
        pitch[pc] /= max;
      }
    }
    chroma.push(pitch);
  }

  return { onsetEnvelope, chroma };
}

function framesFor(seconds: number, sampleRate: number, hopLength: number): number {
  return Math.floor((seconds * sampleRate) / hopLength);
}

/**
 * Onset frames by peak picking on the envelope normalized to [0, 1].
 */
export function pickOnsets(
  envelope: ArrayLike<number>,
  sampleRate: number,
  hopLength = HOP_LENGTH,
  delta = 0.07
): number[] {
  const n = envelope.length;
  if (n === 0) {
    return [];
  }
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < n; i++) {
    min = Math.min(min, envelope[i]);
    max = Math.max(max, envelope[i]);
  }
  const range = max - min;
  if (range <= 0) {
    return [];
  }
  const x = Array.from({ length: n }, (_, i) => (envelope[i] - min) / range);

  const preMax = framesFor(0.03, sampleRate, hopLength);
  const postMax = 1;
  const preAvg = framesFor(0.1, sampleRate, hopLength);
  const postAvg = framesFor(0.1, sampleRate, hopLength) + 1;
  const wait = framesFor(0.03, sampleRate, hopLength);

  const onsets: number[] = [];
  let last = -Infinity;
  for (let t = 0; t < n; t++) {
    let windowMax = -Infinity;
    for (let i = Math.max(0, t - preMax); i < Math.min(n, t + postMax); i++) {
      windowMax = Math.max(windowMax, x[i]);
    }
    if (x[t] !== windowMax) {
      continue;
    }
    const avgFrom = Math.max(0, t - preAvg);
    const avgTo = Math.min(n, t + postAvg);
    let sum = 0;
    for (let i = avgFrom; i < avgTo; i++) {
      sum += x[i];
    }
    if (x[t] < sum / (avgTo - avgFrom) + delta) {
      continue;
    }
    if (t - last > wait) {
      onsets.push(t);
      last = t;
    }
  }
  return onsets;
}

function lagToBpm(lag: number, sampleRate: number, hopLength: number): number {
  return (60 * sampleRate) / (hopLength * lag);
}

/**
 * Global tempo in BPM from the autocorrelation of the onset envelope.
 * Returns 0 for an envelope with no energy.
 */
export function estimateTempo(
  envelope: ArrayLike<number>,
  sampleRate: number,
  hopLength = HOP_LENGTH
): number {
  const n = envelope.length;
  const minLag = Math.max(1, Math.ceil((60 * sampleRate) / (hopLength * TEMPO_MAX_BPM)));
  const maxLag = Math.min(n - 1, Math.ceil((60 * sampleRate) / (hopLength * TEMPO_MIN_BPM)));
  if (maxLag < minLag) {
    return 0;
  }

  const autocorrelation = (lag: number): number => {
    let sum = 0;
    for (let t = 0; t + lag < n; t++) {
      sum += envelope[t] * envelope[t + lag];
    }
    return sum;
  };

  let bestLag = -1;
  let bestScore = 0;
  const values = new Map<number, number>();
  for (let lag = minLag; lag <= maxLag; lag++) {
    const r = autocorrelation(lag);
    values.set(lag, r);
    const octaves = Math.log2(lagToBpm(lag, sampleRate, hopLength) / TEMPO_PRIOR_BPM);
    const score = r * Math.exp(-0.5 * octaves * octaves);
    if (score > bestScore) {
      bestScore = score;
      bestLag = lag;
    }
  }
  if (bestLag < 0) {
    return 0;
  }

  const valueAt = (lag: number): number => values.get(lag) ?? autocorrelation(lag);
  let refined = bestLag;
  if (bestLag - 1 >= 1 && bestLag + 1 < n) {
    const left = valueAt(bestLag - 1);
    const centre = valueAt(bestLag);
    const right = valueAt(bestLag + 1);
    const denominator = left - 2 * centre + right;
    if (denominator < 0) {
      refined = bestLag + (0.5 * (left - right)) / denominator;
    }
  }
  return lagToBpm(refined, sampleRate, hopLength);
}

/**
 * Dynamic-programming beat tracker. Returns beat frames in ascending order.
 */
export function trackBeats(
  envelope: ArrayLike<number>,
  tempo: number,
  sampleRate: number,
  hopLength = HOP_LENGTH,
  tightness = BEAT_TIGHTNESS
): number[] {
  const n = envelope.length;
  if (n === 0 || !(tempo > 0)) {
    return [];
  }

  let mean = 0;
  for (let i = 0; i < n; i++) {
    mean += envelope[i];
  }
  mean /= n;
  let variance = 0;
  for (let i = 0; i < n; i++) {
    variance += (envelope[i] - mean) ** 2;
  }
  const std = Math.sqrt(variance / n);
  if (std === 0) {
    return [];
  }
  const local = Array.from({ length: n }, (_, i) => envelope[i] / std);

  const period = (60 * sampleRate) / (hopLength * tempo);
  const farthest = Math.round(2 * period);
  const nearest = Math.max(1, Math.round(period / 2));

  const cumulative = new Float64Array(n);
  const backlink = new Int32Array(n).fill(-1);
  for (let t = 0; t < n; t++) {
    let best = -Infinity;
    let bestPrev = -1;
    for (let prev = Math.max(0, t - farthest); prev <= t - nearest; prev++) {
      const deviation = Math.log((t - prev) / period);
      const score = cumulative[prev] - tightness * deviation * deviation;
      if (score > best) {
        best = score;
        bestPrev = prev;
      }
    }
    if (best > 0) {
      cumulative[t] = local[t] + best;
      backlink[t] = bestPrev;
    } else {
      cumulative[t] = local[t];
    }
  }

  let last = Math.max(0, n - Math.max(1, Math.round(period)));
  for (let t = last + 1; t < n; t++) {
    if (cumulative[t] > cumulative[last]) {
      last = t;
    }
  }

  const beats: number[] = [];
  for (let t = last; t >= 0; t = backlink[t]) {
    beats.push(t);
  }
  beats.reverse();

  // Drop weak beats at the edges, typically silence before or after the music
  const meanSquare = beats.reduce((acc, beat) => acc + local[beat] * local[beat], 0) / beats.length;
  const threshold = 0.5 * Math.sqrt(meanSquare);
  let from = 0;
  let to = beats.length;
  while (from < to && local[beats[from]] < threshold) {
    from++;
  }
  while (to > from && local[beats[to - 1]] < threshold) {
    to--;
  }
  return beats.slice(from, to);
}

export interface FindPeaksOptions {
  height?: number;
  distance?: number;
}

/**
 * Local maxima of `x`. Plateaus report their middle sample. With `distance`,
 * lower peaks closer than `distance` samples to a higher kept peak are
 * removed.
 */
export function findPeaks(x: ArrayLike<number>, options: FindPeaksOptions = {}): number[] {
  const n = x.length;
  let peaks: number[] = [];
  let i = 1;
  while (i < n - 1) {
    if (x[i] > x[i - 1]) {
      let ahead = i + 1;
      while (ahead < n - 1 && x[ahead] === x[i]) {
        ahead++;
      }
      if (x[ahead] < x[i]) {
        peaks.push(Math.floor((i + ahead - 1) / 2));
        i = ahead;
        continue;
      }
    }
    i++;
  }

  if (options.height !== undefined) {
    const height = options.height;
    peaks = peaks.filter((peak) => x[peak] >= height);
  }

  const distance = options.distance ?? 1;
  if (distance > 1 && peaks.length > 1) {
    const keep = new Array<boolean>(peaks.length).fill(true);
    const byHeight = peaks
      .map((peak, index) => ({ peak, index }))
      .sort((a, b) => x[b.peak] - x[a.peak] || a.index - b.index);
    for (const { peak, index } of byHeight) {
      if (!keep[index]) {
        continue;
      }
      for (let j = index - 1; j >= 0 && peak - peaks[j] < distance; j--) {
        keep[j] = false;
      }
      for (let j = index + 1; j < peaks.length && peaks[j] - peak < distance; j++) {
        keep[j] = false;
      }
    }
    peaks = peaks.filter((_, index) => keep[index]);
  }
  return peaks;
}

/**
 * RMS at every whole second from 0 to floor(duration), taken from the frame
 * nearest to that second. Frame `i` sits at `i * hopLength / sampleRate`.
 */
export function rmsPerSecond(
  rms: ArrayLike<number>,
  duration: number,
  sampleRate: number,
  hopLength: number
): number[] {
  if (rms.length === 0) {
    return [];
  }
  const values: number[] = [];
  for (let second = 0; second <= Math.floor(duration); second++) {
    const frame = Math.min(rms.length - 1, Math.round((second * sampleRate) / hopLength));
    values.push(rms[frame]);
  }
  return values;
}

export function extractFeatures(
  signal: AudioSignal,
  config: AnalysisConfig = new AnalysisConfig()
): AudioFeatures {
  const { samples, sampleRate } = signal;
  const hopLength = HOP_LENGTH;
  const duration = samples.length / sampleRate;

  const rms = computeRms(samples, FRAME_LENGTH, hopLength);
  const rmsTimes = framesToTimes(
    Array.from({ length: rms.length }, (_, i) => i),
    sampleRate,
    hopLength
  );
  const { onsetEnvelope, chroma } = computeSpectralFeatures(samples, sampleRate, FRAME_LENGTH, hopLength);

  const tempo = estimateTempo(onsetEnvelope, sampleRate, hopLength);
  const beatFrames = trackBeats(onsetEnvelope, tempo, sampleRate, hopLength);
  const onsetFrames = pickOnsets(onsetEnvelope, sampleRate, hopLength);

  const blockFrames = poolFrames(sampleRate, hopLength, SECTION_BLOCK_SEC);
  const boundaryFrames = agglomerativeBoundaries(chroma, config.section_count, blockFrames);

  let meanRms = 0;
  for (let i = 0; i < rms.length; i++) {
    meanRms += rms[i];
  }
  meanRms = rms.length > 0 ? meanRms / rms.length : 0;
  const peakFrames = findPeaks(rms, {
    height: meanRms * PEAK_HEIGHT_FACTOR,
    distance: Math.max(1, Math.round((config.peak_distance_sec * sampleRate) / hopLength))
  });

  return {
    sampleRate,
    hopLength,
    duration,
    tempo,
    beatTimes: framesToTimes(beatFrames, sampleRate, hopLength),
    onsetTimes: framesToTimes(onsetFrames, sampleRate, hopLength),
    segmentTimes: framesToTimes(boundaryFrames, sampleRate, hopLength),
    rms,
    rmsTimes,
    energyPeaks: peakFrames.map((frame) => rmsTimes[frame]),
    rmsPerSecond: rmsPerSecond(rms, duration, sampleRate, hopLength),
    chroma
  };
}

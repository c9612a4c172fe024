import { AnalysisConfig } from "./config";
import { poolFrames, poolValues } from "./audio/segmentation";
import { roundTime } from "./text/timestamps";
import { AudioFeatures, Cue, Detection, Section, Subsection, Transition, TransitionKind } from "./types";

export const SILENCE_FLOOR = 1e-4;
const ENERGY_BLOCK_SEC = 0.5;
const LABEL_WORDS = 6;

interface EnergyChange {
  time: number;
  kind: "energy-rise" | "energy-fall";
  strength: number;
}

function share(duration: number, total: number): number {
  return total > 0 ? Math.round((duration / total) * 10000) / 10000 : 0;
}

function buildSection(index: number, subsections: Subsection[], total: number): Section {
  const start = subsections[0].start;
  const end = subsections[subsections.length - 1].end;
  const duration = roundTime(end - start);
  return {
    index,
    title: `Section ${index}`,
    start,
    end,
    duration,
    share: share(duration, total),
    subsections
  };
}

/**
 * Points where pooled RMS jumps by at least `ratio` against the previous
 * block.
 */
export function energyChanges(
  rms: ArrayLike<number>,
  sampleRate: number,
  hopLength: number,
  ratio: number
): EnergyChange[] {
  const blockFrames = poolFrames(sampleRate, hopLength, ENERGY_BLOCK_SEC);
  const blocks = poolValues(rms, blockFrames);
  const changes: EnergyChange[] = [];
  for (let j = 1; j < blocks.length; j++) {
    const previous = blocks[j - 1];
    const current = blocks[j];
    const reference = Math.max(previous, SILENCE_FLOOR);
    const time = (j * blockFrames * hopLength) / sampleRate;
    if (current >= reference * ratio) {
      changes.push({ time, kind: "energy-rise", strength: roundTime(current / reference) });
    } else if (previous > SILENCE_FLOOR && current * ratio <= previous) {
      changes.push({ time, kind: "energy-fall", strength: roundTime(current / reference) });
    }
  }
  return changes;
}

const LABEL_BY_KIND: Partial<Record<TransitionKind, string>> = {
  "energy-rise": "rising",
  "energy-fall": "falling"
};

/**
 * Sections at harmonic boundaries, subsections at marked energy changes.
 */
export function detectAudioSections(
  features: AudioFeatures,
  config: AnalysisConfig = new AnalysisConfig()
): Detection {
  const total = features.duration;
  const boundaries = [...new Set(features.segmentTimes.filter((time) => time < total))].sort(
    (a, b) => a - b
  );
  if (boundaries.length === 0 || boundaries[0] > 0) {
    boundaries.unshift(0);
  }
  const changes = energyChanges(features.rms, features.sampleRate, features.hopLength, config.rise_ratio);

  const sections: Section[] = [];
  const transitions: Transition[] = [];
  let previousId: string | undefined;

  boundaries.forEach((start, position) => {
    const end = position + 1 < boundaries.length ? boundaries[position + 1] : total;
    if (roundTime(end) <= roundTime(start)) {
      return;
    }
    const index = sections.length + 1;

    const cuts: { time: number; change?: EnergyChange }[] = [{ time: start }];
    for (const change of changes) {
      if (change.time <= start || change.time >= end) {
        continue;
      }
      const lastCut = cuts[cuts.length - 1].time;
      if (change.time - lastCut >= config.min_subsection_sec && end - change.time >= config.min_subsection_sec) {
        cuts.push({ time: change.time, change });
      }
    }

    const subsections: Subsection[] = cuts.map((cut, n) => {
      const subStart = roundTime(cut.time);
      const subEnd = roundTime(n + 1 < cuts.length ? cuts[n + 1].time : end);
      const id = `${index}.${n + 1}`;
      const kind: TransitionKind = cut.change ? cut.change.kind : "harmonic";
      if (previousId !== undefined) {
        transitions.push({
          time: subStart,
          kind,
          from: previousId,
          to: id,
          ...(cut.change ? { strength: cut.change.strength } : {})
        });
      }
      previousId = id;
      return {
        id,
        label: LABEL_BY_KIND[kind] ?? "steady",
        start: subStart,
        end: subEnd,
        duration: roundTime(subEnd - subStart)
      };
    });

    sections.push(buildSection(index, subsections, total));
  });

  return { sections, transitions };
}

function labelFor(speaker: string | null, text: string): string {
  if (speaker) {
    return speaker;
  }
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const head = words.slice(0, LABEL_WORDS).join(" ");
  return words.length > LABEL_WORDS ? `${head}…` : head;
}

/** Latest cue end, or 0 without cues. */
export function latestEnd(cues: Cue[]): number {
  let end = 0;
  for (const cue of cues) {
    if (cue.end > end) {
      end = cue.end;
    }
  }
  return end;
}

function buildSubsection(id: string, cues: Cue[], limit?: number): Subsection {
  const start = roundTime(cues[0].start);
  const reach = latestEnd(cues);
  // A cue that starts before this group ends takes over from its start.
  const end = roundTime(limit !== undefined ? Math.min(reach, limit) : reach);
  const speaker = cues.find((cue) => cue.speaker)?.speaker ?? null;
  const text = cues.map((cue) => cue.text).join(" ").trim();
  return {
    id,
    label: labelFor(speaker, text),
    start,
    end,
    duration: roundTime(end - start),
    speaker,
    text
  };
}

/**
 * Subsections at speaker changes and pauses, sections at long pauses.
 */
export function detectDialogueSections(
  cues: Cue[],
  config: AnalysisConfig = new AnalysisConfig(),
  totalDuration?: number
): Detection {
  const ordered = [...cues].sort((a, b) => a.start - b.start || a.end - b.end);
  if (ordered.length === 0) {
    return { sections: [], transitions: [] };
  }
  const total = totalDuration ?? latestEnd(ordered);

  const sections: Section[] = [];
  const transitions: Transition[] = [];
  let sectionSubs: Subsection[] = [];
  let current: Cue[] = [ordered[0]];
  let currentEnd = ordered[0].end;
  let pending: { kind: TransitionKind; time: number; strength?: number } | undefined;
  let previousId: string | undefined;

  const closeSubsection = (limit?: number): void => {
    const id = `${sections.length + 1}.${sectionSubs.length + 1}`;
    const subsection = buildSubsection(id, current, limit);
    if (pending && previousId !== undefined) {
      transitions.push({
        time: roundTime(pending.time),
        kind: pending.kind,
        from: previousId,
        to: id,
        ...(pending.strength !== undefined ? { strength: pending.strength } : {})
      });
    }
    previousId = id;
    sectionSubs.push(subsection);
  };

  const closeSection = (): void => {
    sections.push(buildSection(sections.length + 1, sectionSubs, total));
    sectionSubs = [];
  };

  for (const cue of ordered.slice(1)) {
    const gap = cue.start - currentEnd;
    const speaker = current.find((item) => item.speaker)?.speaker;
    let kind: TransitionKind | undefined;
    if (gap > config.section_gap_sec) {
      kind = "section-break";
    } else if (speaker && cue.speaker && cue.speaker !== speaker) {
      kind = "speaker-change";
    } else if (gap > config.gap_sec) {
      kind = "pause";
    } else if (config.max_subsection_sec > 0 && cue.end - current[0].start > config.max_subsection_sec) {
      kind = "max-length";
    }

    if (kind) {
      closeSubsection(cue.start);
      if (kind === "section-break") {
        closeSection();
      }
      pending = {
        kind,
        time: cue.start,
        ...(kind === "section-break" || kind === "pause" ? { strength: roundTime(gap) } : {})
      };
      current = [cue];
      currentEnd = cue.end;
    } else {
      current.push(cue);
      currentEnd = Math.max(currentEnd, cue.end);
    }
  }
  closeSubsection();
  closeSection();

  return { sections, transitions };
}

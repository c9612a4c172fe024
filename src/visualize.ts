import { AudioFeatures, TimingReport } from "./types";

const WIDTH = 1000;
const MARGIN_LEFT = 50;
const MARGIN_RIGHT = 10;
const PLOT_WIDTH = WIDTH - MARGIN_LEFT - MARGIN_RIGHT;
const TOP_PADDING = 10;
const PANEL_HEIGHT = 150;
const PANEL_TITLE_HEIGHT = 20;
const PANEL_GAP = 30;
const AXIS_HEIGHT = 30;
const MAX_TICKS = 10;
const TICK_STEPS = [1, 2, 5, 10, 15, 30, 60, 120, 300, 600, 900, 1800, 3600];

const SECTION_FILLS = ["#dbeafe", "#fde68a"];
const BEAT_COLOR = "#dc2626";
const SEGMENT_COLOR = "#16a34a";
const LINE_COLOR = "#475569";

interface Panel {
  title: string;
  top: number;
  plotTop: number;
  plotBottom: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function fmt(value: number): string {
  return value.toFixed(1);
}

function panelAt(index: number, title: string): Panel {
  const top = TOP_PADDING + index * (PANEL_HEIGHT + PANEL_GAP);
  return { title, top, plotTop: top + PANEL_TITLE_HEIGHT, plotBottom: top + PANEL_HEIGHT };
}

function panelTitle(panel: Panel): string {
  return `<text class="panel-title" x="${fmt(MARGIN_LEFT)}" y="${fmt(panel.top + 14)}" font-size="12">${escapeXml(
    panel.title
  )}</text>`;
}

function verticalLine(className: string, x: number, panel: Panel, stroke: string, extra = ""): string {
  return `<line class="${className}" x1="${fmt(x)}" y1="${fmt(panel.plotTop)}" x2="${fmt(x)}" y2="${fmt(
    panel.plotBottom
  )}" stroke="${stroke}"${extra}/>`;
}

/**
 * Largest RMS per pixel column, paired with the time of the column's first
 * frame. Short signals keep one point per frame.
 */
export function envelopeColumns(
  rms: ArrayLike<number>,
  sampleRate: number,
  hopLength: number,
  columns: number = PLOT_WIDTH
): [number, number][] {
  const count = Math.min(rms.length, columns);
  const points: [number, number][] = [];
  for (let c = 0; c < count; c++) {
    const from = Math.floor((c * rms.length) / count);
    const to = Math.floor(((c + 1) * rms.length) / count);
    let peak = 0;
    for (let i = from; i < to; i++) {
      peak = Math.max(peak, rms[i]);
    }
    points.push([(from * hopLength) / sampleRate, peak]);
  }
  return points;
}

function maxOf(points: [number, number][]): number {
  let max = 0;
  for (const [, value] of points) {
    max = Math.max(max, value);
  }
  return max;
}

/**
 * Timeline of the report as an SVG document: sections and subsections, and
 * for audio the RMS envelope with beats and harmonic boundaries, then the
 * RMS energy curve with its peaks.
 */
export function renderTimingSvg(report: TimingReport, features?: AudioFeatures): string {
  const duration = report.duration > 0 ? report.duration : 1;
  const x = (time: number): number => MARGIN_LEFT + (Math.min(Math.max(time, 0), duration) / duration) * PLOT_WIDTH;

  const body: string[] = [];
  const panels: Panel[] = [];

  const sectionsPanel = panelAt(panels.length, "Sections and subsections");
  panels.push(sectionsPanel);
  body.push(panelTitle(sectionsPanel));
  report.sections.forEach((section, index) => {
    const left = x(section.start);
    body.push(
      `<rect class="section" x="${fmt(left)}" y="${fmt(sectionsPanel.plotTop)}" width="${fmt(
        x(section.end) - left
      )}" height="${fmt(sectionsPanel.plotBottom - sectionsPanel.plotTop)}" fill="${
        SECTION_FILLS[index % SECTION_FILLS.length]
      }"/>`
    );
    body.push(
      `<text class="section-title" x="${fmt(left + 4)}" y="${fmt(sectionsPanel.plotTop + 14)}" font-size="11">${escapeXml(
        section.title
      )}</text>`
    );
    for (const sub of section.subsections.slice(1)) {
      body.push(verticalLine("subsection", x(sub.start), sectionsPanel, LINE_COLOR, ' stroke-dasharray="4 3"'));
    }
  });

  if (features && features.rms.length > 0) {
    const points = envelopeColumns(features.rms, features.sampleRate, features.hopLength);
    const loudest = maxOf(points);
    const max = loudest > 0 ? loudest : 1;

    const envelopePanel = panelAt(panels.length, "Waveform envelope, beats (red) and harmonic boundaries (green)");
    panels.push(envelopePanel);
    body.push(panelTitle(envelopePanel));
    const mid = (envelopePanel.plotTop + envelopePanel.plotBottom) / 2;
    const half = (envelopePanel.plotBottom - envelopePanel.plotTop) / 2;
    const upper = points.map(([time, value]) => `${fmt(x(time))},${fmt(mid - (value / max) * half)}`);
    const lower = points.map(([time, value]) => `${fmt(x(time))},${fmt(mid + (value / max) * half)}`).reverse();
    body.push(`<polygon class="envelope" points="${[...upper, ...lower].join(" ")}" fill="#94a3b8"/>`);
    for (const beat of features.beatTimes) {
      body.push(verticalLine("beat", x(beat), envelopePanel, BEAT_COLOR));
    }
    for (const boundary of features.segmentTimes) {
      body.push(verticalLine("segment", x(boundary), envelopePanel, SEGMENT_COLOR, ' stroke-width="2"'));
    }

    const rmsPanel = panelAt(panels.length, "RMS energy (loudness)");
    panels.push(rmsPanel);
    body.push(panelTitle(rmsPanel));
    const height = rmsPanel.plotBottom - rmsPanel.plotTop;
    const y = (value: number): number => rmsPanel.plotBottom - (value / max) * height;
    body.push(
      `<polyline class="rms" points="${points
        .map(([time, value]) => `${fmt(x(time))},${fmt(y(value))}`)
        .join(" ")}" fill="none" stroke="${LINE_COLOR}"/>`
    );
    for (const peak of features.energyPeaks) {
      const frame = Math.min(
        features.rms.length - 1,
        Math.round((peak * features.sampleRate) / features.hopLength)
      );
      body.push(
        `<circle class="peak" cx="${fmt(x(peak))}" cy="${fmt(y(features.rms[frame]))}" r="3" fill="${BEAT_COLOR}"/>`
      );
    }
  }

  const axisY = panels[panels.length - 1].plotBottom;
  body.push(
    `<line class="axis" x1="${fmt(MARGIN_LEFT)}" y1="${fmt(axisY)}" x2="${fmt(MARGIN_LEFT + PLOT_WIDTH)}" y2="${fmt(
      axisY
    )}" stroke="${LINE_COLOR}"/>`
  );
  const step = TICK_STEPS.find((candidate) => duration / candidate <= MAX_TICKS) ?? TICK_STEPS[TICK_STEPS.length - 1];
  for (let tick = 0; tick <= duration; tick += step) {
    body.push(
      `<text class="tick" x="${fmt(x(tick))}" y="${fmt(axisY + 16)}" font-size="10" text-anchor="middle">${tick}s</text>`
    );
  }

  const totalHeight = TOP_PADDING + panels.length * PANEL_HEIGHT + (panels.length - 1) * PANEL_GAP + AXIS_HEIGHT;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${totalHeight}" viewBox="0 0 ${WIDTH} ${totalHeight}">`,
    `<title>Timing analysis of ${escapeXml(report.source)}</title>`,
    '<rect width="100%" height="100%" fill="#ffffff"/>',
    ...body,
    "</svg>",
    ""
  ].join("\n");
}

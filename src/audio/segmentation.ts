/** Number of frames in a pooling block of `seconds`. */
export function poolFrames(sampleRate: number, hopLength: number, seconds: number): number {
  return Math.max(1, Math.round((seconds * sampleRate) / hopLength));
}

/** Average consecutive feature frames in blocks of `blockFrames`. */
export function poolFeatures(frames: ArrayLike<number>[], blockFrames: number): Float64Array[] {
  const blocks: Float64Array[] = [];
  if (frames.length === 0) {
    return blocks;
  }
  const dims = frames[0].length;
  for (let start = 0; start < frames.length; start += blockFrames) {
    const end = Math.min(frames.length, start + blockFrames);
    const mean = new Float64Array(dims);
    for (let t = start; t < end; t++) {
      for (let d = 0; d < dims; d++) {
        mean[d] += frames[t][d];
      }
    }
    for (let d = 0; d < dims; d++) {
      mean[d] /= end - start;
    }
    blocks.push(mean);
  }
  return blocks;
}

export function poolValues(values: ArrayLike<number>, blockFrames: number): number[] {
  const blocks: number[] = [];
  for (let start = 0; start < values.length; start += blockFrames) {
    const end = Math.min(values.length, start + blockFrames);
    let sum = 0;
    for (let t = start; t < end; t++) {
      sum += values[t];
    }
    blocks.push(sum / (end - start));
  }
  return blocks;
}

interface Cluster {
  start: number;
  size: number;
  mean: Float64Array;
}

function wardCost(a: Cluster, b: Cluster): number {
  let distance = 0;
  for (let d = 0; d < a.mean.length; d++) {
    const diff = a.mean[d] - b.mean[d];
    distance += diff * diff;
  }
  return ((a.size * b.size) / (a.size + b.size)) * distance;
}

function merge(a: Cluster, b: Cluster): Cluster {
  const size = a.size + b.size;
  const mean = new Float64Array(a.mean.length);
  for (let d = 0; d < mean.length; d++) {
    mean[d] = (a.mean[d] * a.size + b.mean[d] * b.size) / size;
  }
  return { start: a.start, size, mean };
}

/**
 * Temporally constrained Ward clustering: only neighbouring clusters merge,
 * cheapest pair first (leftmost on ties), until `k` remain. Returns the
 * index of the first item of each cluster, starting with 0.
 */
export function agglomerate(items: ArrayLike<number>[], k: number): number[] {
  if (items.length === 0) {
    return [];
  }
  let clusters: Cluster[] = Array.from(items, (item, index) => ({
    start: index,
    size: 1,
    mean: Float64Array.from(item)
  }));
  const target = Math.max(1, Math.min(k, clusters.length));

  while (clusters.length > target) {
    let cheapest = 0;
    let cheapestCost = Infinity;
    for (let i = 0; i + 1 < clusters.length; i++) {
      const cost = wardCost(clusters[i], clusters[i + 1]);
      if (cost < cheapestCost) {
        cheapestCost = cost;
        cheapest = i;
      }
    }
    clusters = [
      ...clusters.slice(0, cheapest),
      merge(clusters[cheapest], clusters[cheapest + 1]),
      ...clusters.slice(cheapest + 2)
    ];
  }
  return clusters.map((cluster) => cluster.start);
}

/**
 * Boundary frames of `k` harmonic sections over per-frame features.
 */
export function agglomerativeBoundaries(
  frames: ArrayLike<number>[],
  k: number,
  blockFrames: number
): number[] {
  const blocks = poolFeatures(frames, blockFrames);
  return agglomerate(blocks, k).map((block) => block * blockFrames);
}

import type { AlertLevel, SpikeIndex, SpikeMarker } from "../contracts";

export const DEFAULT_SPIKE_CAPACITY = 50;
/** Default hover tolerance: half a one-minute bar either side. */
export const DEFAULT_LOOKUP_TOLERANCE_MS = 30_000;

export interface SpikeInput {
  pair: string;
  ts: number;
  price: number;
  pct: number;
  level: AlertLevel;
  lookback: number;
}

/**
 * Bounded ring of recent spike markers per pair.
 * Markers stay sorted by bar timestamp; a bar already marked is not marked twice,
 * since the same last bar is usually re-read on the next poll.
 */
export class SpikeTracker implements SpikeIndex {
  private rings = new Map<string, SpikeMarker[]>();
  private seq = 0;

  constructor(private readonly capacity: number = DEFAULT_SPIKE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`spike capacity must be a positive integer, got ${capacity}`);
  }

  /** Returns the stored marker, or null when that bar is already marked. */
  record(input: SpikeInput): SpikeMarker | null {
    let ring = this.rings.get(input.pair);
    if (!ring) { ring = []; this.rings.set(input.pair, ring); }
    if (ring.some(m => m.ts === input.ts)) return null;
    const marker: SpikeMarker = { id: `${input.pair}#${++this.seq}`, ...input };
    // usually appends; late bars are slotted in by ts
    let i = ring.length;
    while (i > 0 && ring[i - 1].ts > marker.ts) i--;
    ring.splice(i, 0, marker);
    if (ring.length > this.capacity) ring.splice(0, ring.length - this.capacity);
    return ring.includes(marker) ? marker : null;
  }

  markers(pair: string): SpikeMarker[] {
    return [...(this.rings.get(pair) ?? [])];
  }

  size(pair?: string): number {
    if (pair !== undefined) return this.rings.get(pair)?.length ?? 0;
    let n = 0;
    for (const r of this.rings.values()) n += r.length;
    return n;
  }

  latest(pair: string): SpikeMarker | null {
    const ring = this.rings.get(pair);
    return ring && ring.length ? ring[ring.length - 1] : null;
  }

  /** Cursor access; negative indexes count from the newest marker. */
  at(pair: string, index: number): SpikeMarker | null {
    const ring = this.rings.get(pair);
    if (!ring || !ring.length || !Number.isInteger(index)) return null;
    const i = index < 0 ? ring.length + index : index;
    return i >= 0 && i < ring.length ? ring[i] : null;
  }

  /** Nearest marker to `ts` within the tolerance; earlier marker wins a tie. */
  lookup(pair: string, ts: number, toleranceMs: number = DEFAULT_LOOKUP_TOLERANCE_MS): SpikeMarker | null {
    const ring = this.rings.get(pair);
    if (!ring) return null;
    let best: SpikeMarker | null = null;
    let bestDist = Infinity;
    for (const m of ring) {
      const d = Math.abs(m.ts - ts);
      if (d <= toleranceMs && d < bestDist) { best = m; bestDist = d; }
    }
    return best;
  }

  clear(pair?: string) {
    if (pair !== undefined) this.rings.delete(pair);
    else this.rings.clear();
  }
}

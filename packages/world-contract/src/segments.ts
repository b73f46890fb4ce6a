/** Valid segment indices are `0 .. SEGMENT_COUNT - 1`. */
export const SEGMENT_COUNT = 100;

/** Largest payload, in bytes, a single segment accepts. */
export const MAX_SEGMENT_BYTES = 100 * 1024;

/** Segments readable at the same time. */
export const MAX_ACTIVE_SEGMENTS = 10;

/**
 * Host storage for persistent segments. A segment only becomes readable on a
 * tick after it was named in `setActiveSegments`.
 */
export interface SegmentPlatform {
  activeSegments(): readonly number[];
  read(segment: number): string | undefined;
  write(segment: number, data: string): void;
  setActiveSegments(segments: readonly number[]): void;
}

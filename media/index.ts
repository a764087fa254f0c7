/**
 * Media handling: discovery, duration probing and segmentation
 */
export { scanMediaFiles, toMediaFile } from "./inventory";
export { DurationProber, extractDuration, type DurationSource, type ProbeData } from "./prober";
export { Segmenter, wholeFile, type MediaSegmenter } from "./segmenter";
export type { MediaFile, Segment } from "./types";

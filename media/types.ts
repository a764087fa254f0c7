/**
 * A supported media file discovered in the input folder
 */
export interface MediaFile {
  /** Absolute or input-relative path to the file */
  readonly path: string;
  /** File name including extension */
  readonly name: string;
  /** Lower-cased extension with the leading dot, e.g. ".mp4" */
  readonly extension: string;
  /** File name without extension */
  readonly stem: string;
}

/**
 * A time-bounded slice of a MediaFile
 */
export interface Segment {
  readonly path: string;
  /** Zero-based ordinal within the source file */
  readonly index: number;
  /**
   * True when the file was produced by segmentation and must be removed
   * once the transcript is written. The unsplit fallback points at the
   * source itself and is never temporary.
   */
  readonly temporary: boolean;
}

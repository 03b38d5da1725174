/**
 * types.ts — Catalog data model
 *
 * Clip   one source fragment as found on disk, immutable once cataloged
 * Group  every clip for one (date, camera), ordered by (time, sequence)
 */

export interface ClipFields {
  /** YYYYMMDD */
  date: string;
  /** HHMMSS */
  time: string;
  /** Device-assigned, zero-padded; compared as text, never as a number. */
  sequence: string;
  camera: string;
}

export interface Clip extends ClipFields {
  path: string;
  fileName: string;
  sizeBytes: number;
}

export interface Group {
  date: string;
  camera: string;
  clips: readonly Clip[];
}

/** date → camera → ordered clips */
export type Catalog = Map<string, Map<string, Clip[]>>;

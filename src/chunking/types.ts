/**
 * A contiguous 1-indexed, inclusive line range of one file
 */
export interface Chunk {
  content: string;
  /** Project-relative, POSIX separators */
  filePath: string;
  startLine: number;
  endLine: number;
  /** Declaration name, `(imports)`, `(trailing)`, or absent for window chunks */
  symbolName?: string;
  /** Detector identity; empty for files no detector understands */
  language: string;
}

export interface DeclarationSpan {
  startLine: number;
  endLine: number;
  name?: string;
}

/**
 * Finds top-level declaration spans in file text.
 *
 * `detect` returns null when the detector cannot handle this input (grammar not
 * loaded, parser failure) so the cascade can move on to the next tier.
 */
export interface BoundaryDetector {
  readonly language: string;
  /** Short label for logs, e.g. `ast:python` or `pattern:sql` */
  readonly strategy: string;
  supports(extension: string): boolean;
  detect(content: string, smallFileThreshold?: number): DeclarationSpan[] | null;
}

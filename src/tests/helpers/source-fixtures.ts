/**
 * `count` lines reading `line 1`, `line 2`, ... joined without a trailing newline
 */
export function numberedLines(count: number, prefix = 'line'): string {
  return Array.from({ length: count }, (_, index) => `${prefix} ${index + 1}`).join('\n');
}

/**
 * A file of `total` lines where `placed` maps 1-based line numbers to their text
 * and every other line is `filler`
 */
export function sourceWithLines(total: number, placed: Record<number, string>, filler: string): string {
  return Array.from({ length: total }, (_, index) => placed[index + 1] ?? filler).join('\n');
}

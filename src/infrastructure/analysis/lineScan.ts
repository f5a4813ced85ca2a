/**
 * Helpers for the indentation-based line scans shared by analyzer front-ends
 */

export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export function isCommentOrBlank(line: string, commentPrefix: string = '#'): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith(commentPrefix);
}

/**
 * Index one past the last line of the indented block opened at `start`
 */
export function findBlockEnd(lines: string[], start: number): number {
  const headerIndent = indentOf(lines[start]);
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    if (indentOf(lines[i]) <= headerIndent) return i;
  }
  return lines.length;
}

/**
 * Text of a block: whatever follows the header's colon plus the indented lines
 */
export function blockText(lines: string[], start: number, headerRemainder: string): string {
  const end = findBlockEnd(lines, start);
  return [headerRemainder, ...lines.slice(start + 1, end)].join('\n');
}

/**
 * Parse a numeric literal as written in source (`1_000_000`, `10**6`, `1e6`)
 */
export function parseNumericLiteral(text: string): number | null {
  const cleaned = text.replace(/_/g, '').trim();
  const power = cleaned.match(/^(\d+)\s*\*\*\s*(\d+)$/);
  if (power) {
    return Math.pow(Number(power[1]), Number(power[2]));
  }
  if (!/^\d+(\.\d+)?(e\d+)?$/i.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

export function lineNumberAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

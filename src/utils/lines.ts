/**
 * Split line-oriented file contents, dropping the newline that ends the last line.
 */
export function splitLines(contents: string): string[] {
  if (contents === '') {
    return [];
  }
  const lines = contents.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Join lines back into file contents, one trailing newline per line.
 */
export function joinLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

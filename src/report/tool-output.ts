/**
 * Reading the tool's parameters and output.
 */

/**
 * Whether a parameter string carries a flag, as `--flag` or `--flag=value`.
 */
export function hasFlag(params: string, flag: string): boolean {
  return params
    .split(/\s+/)
    .some((token) => token === flag || token.startsWith(`${flag}=`));
}

/**
 * First flag from the list present in the parameters.
 */
export function findFlag(params: string, flags: readonly string[]): string | undefined {
  return flags.find((flag) => hasFlag(params, flag));
}

/**
 * Find the artifact path announced by the tool.
 *
 * The tool prints the marker line and the path on the line after it; the
 * first of the two lines matching the artifact pattern wins.
 */
export function extractArtifactPath(
  output: string,
  marker: string,
  pattern: string
): string | undefined {
  const matcher = new RegExp(pattern);
  const lines = output.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    if (!lines[index].includes(marker)) {
      continue;
    }
    const candidate = lines
      .slice(index, index + 2)
      .find((line) => matcher.test(line));
    if (candidate !== undefined) {
      return candidate.trim();
    }
  }

  return undefined;
}

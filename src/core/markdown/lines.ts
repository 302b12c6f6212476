/**
 * Line-level helpers shared by the markdown scanners.
 */

const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Split text into lines, accepting LF and CRLF.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * For each line, whether it belongs to a fenced code block
 * (fence lines included). An unclosed fence runs to the end of the file.
 */
export function codeFenceMask(lines: string[]): boolean[] {
  const mask: boolean[] = [];
  let open: { char: string; length: number } | null = null;

  for (const line of lines) {
    const match = FENCE_PATTERN.exec(line);
    if (open === null) {
      if (match) {
        open = { char: match[1][0], length: match[1].length };
        mask.push(true);
      } else {
        mask.push(false);
      }
      continue;
    }

    mask.push(true);
    // Closing fences carry no info string
    if (
      match &&
      match[1][0] === open.char &&
      match[1].length >= open.length &&
      /^[`~]+$/.test(line.trim())
    ) {
      open = null;
    }
  }

  return mask;
}

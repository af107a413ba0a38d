/**
 * Text-only helpers for cutting a function's header and body out of the
 * line-indexed source. Line numbers are 1-based and inclusive.
 */

/**
 * Drop everything from the first `#` on and trim the right side.
 * This is purely textual: a `#` inside a string literal also counts.
 */
export function stripLineComment(line: string): string {
  const hash = line.indexOf("#");
  return (hash === -1 ? line : line.slice(0, hash)).trimEnd();
}

export function sliceBody(
  lines: readonly string[],
  startLine: number,
  endLine: number
): string {
  return lines.slice(startLine - 1, endLine).join("");
}

/**
 * Rebuild the declaration header. Lines are taken from `startLine` until one
 * whose code part ends with `:`; that line is cut at its comment so the
 * result ends on the colon. When no line qualifies the whole span is used.
 */
export function sliceSignature(
  lines: readonly string[],
  startLine: number,
  endLine: number
): string {
  const header: string[] = [];

  for (const line of lines.slice(startLine - 1, endLine)) {
    const code = stripLineComment(line);
    if (code.endsWith(":")) {
      header.push(code);
      break;
    }
    header.push(line);
  }

  return header.join("").trimEnd();
}

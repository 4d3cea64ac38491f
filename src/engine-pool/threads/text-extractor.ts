export const NO_TEXT_DETECTED = 'No text detected in document';

// Control, format, private-use and unassigned code points, plus the
// replacement character that invalid UTF-8 decodes to.
const PRINTABLE_RUN = /[^\p{C}\uFFFD]+/gu;

/**
 * Pull readable text out of an arbitrary document.
 *
 * Decodes as UTF-8, splits on line breaks and keeps the runs of printable
 * characters of at least `minRunLength` characters. Runs on one line are
 * joined with a single space.
 */
export function extractText(content: Uint8Array, minRunLength = 3): string {
  const decoded = Buffer.from(content).toString('utf8').replace(/\t/g, ' ');

  const lines: string[] = [];
  for (const line of decoded.split(/\r\n|\n|\r/)) {
    const runs = (line.match(PRINTABLE_RUN) ?? [])
      .map((run) => run.trim())
      .filter((run) => run.length >= minRunLength);

    if (runs.length > 0) {
      lines.push(runs.join(' '));
    }
  }

  return lines.length > 0 ? lines.join('\n') : NO_TEXT_DETECTED;
}

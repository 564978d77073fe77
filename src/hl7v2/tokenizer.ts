/**
 * Splits raw HL7v2 text into segment lines.
 *
 * Senders disagree on segment terminators: the standard uses `\r`, files
 * saved on Windows carry `\r\n`, and hand-edited samples often use `\n`.
 * All three are folded into `\r` before splitting.
 */

const SEGMENT_DELIMITER = "\r";
const BYTE_ORDER_MARK = "\uFEFF";

export function normalizeLineEndings(text: string): string {
  const withoutBom = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  return withoutBom.replace(/\r\n/g, SEGMENT_DELIMITER).replace(/\n/g, SEGMENT_DELIMITER);
}

/**
 * Split a message into segment lines, preserving order.
 *
 * Leading and trailing delimiters are dropped, so there is never an empty
 * trailing segment. Blank segments in the middle of a message are kept;
 * reporting them is the validator's job.
 */
export function splitSegments(text: string): string[] {
  let normalized = normalizeLineEndings(text);

  let start = 0;
  let end = normalized.length;
  while (start < end && normalized[start] === SEGMENT_DELIMITER) start++;
  while (end > start && normalized[end - 1] === SEGMENT_DELIMITER) end--;
  normalized = normalized.slice(start, end);

  if (normalized === "") return [];
  return normalized.split(SEGMENT_DELIMITER);
}

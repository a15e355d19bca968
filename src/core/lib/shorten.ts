import stringWidth from "string-width";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export const displayWidth = (text: string): number => stringWidth(text);

/**
 * Keep the first line of `text` and cut it down to `width` terminal columns.
 *
 * Cuts happen between grapheme clusters, so wide and combined characters are
 * either kept whole or dropped whole.
 */
export const shorten = (text: string, width: number): string => {
  const newline = text.indexOf("\n");
  const firstLine = newline === -1 ? text : text.slice(0, newline);
  if (stringWidth(firstLine) <= width) return firstLine;

  let kept = "";
  let used = 0;
  for (const { segment } of segmenter.segment(firstLine)) {
    const w = stringWidth(segment);
    if (used + w > width) break;
    kept += segment;
    used += w;
  }
  return kept;
};

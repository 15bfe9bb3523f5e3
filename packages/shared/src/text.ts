export type ChunkLimits = {
  /** Size of the first slice, which travels with the primary message. */
  threshold: number;
  /** Size of every later slice. */
  chunkSize: number;
};

export type TextChunk = {
  index: number;
  total: number;
  text: string;
};

export type TruncatedText = {
  text: string;
  truncated: boolean;
  totalLength: number;
};

/**
 * Splits `text` into ordered slices. Text up to `threshold` characters stays a
 * single chunk; longer text yields `1 + ceil((length - threshold) / chunkSize)`
 * chunks whose concatenation is the input. A cut that would separate a
 * surrogate pair moves back one unit, which can add a chunk.
 */
export function chunkText(text: string, limits: ChunkLimits): TextChunk[] {
  const { threshold, chunkSize } = limits;
  if (threshold <= 0 || chunkSize <= 0) {
    throw new RangeError("chunk limits must be positive");
  }
  if (text.length <= threshold) {
    return [{ index: 1, total: 1, text }];
  }

  const slices: string[] = [];
  let start = 0;
  let size = threshold;
  while (start < text.length) {
    let end = safeCut(text, start + size);
    if (end <= start) {
      end = start + size;
    }
    slices.push(text.slice(start, end));
    start = end;
    size = chunkSize;
  }
  return slices.map((slice, i) => ({ index: i + 1, total: slices.length, text: slice }));
}

export function countChunks(length: number, limits: ChunkLimits): number {
  if (length <= limits.threshold) {
    return 1;
  }
  return 1 + Math.ceil((length - limits.threshold) / limits.chunkSize);
}

export function truncateText(text: string, cap: number): TruncatedText {
  if (text.length <= cap) {
    return { text, truncated: false, totalLength: text.length };
  }
  return { text: text.slice(0, safeCut(text, cap)), truncated: true, totalLength: text.length };
}

/** Moves `index` back by one when it falls between the halves of a surrogate pair. */
function safeCut(text: string, index: number): number {
  if (index <= 0 || index >= text.length) {
    return index;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  const splitsPair = before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
  return splitsPair ? index - 1 : index;
}

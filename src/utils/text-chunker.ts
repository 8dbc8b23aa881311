/**
 * Split text into trimmed chunks of at most `maxLength` characters,
 * preferring paragraph, then line, then word boundaries, and cutting hard
 * only when a single word is longer than the limit.
 */
export function chunkText(text: string, maxLength: number): string[] {
  if (maxLength < 1) throw new RangeError("maxLength must be at least 1");

  const chunks: string[] = [];
  let remaining = text.trim();

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // One extra character so a boundary sitting exactly at the limit counts.
    const slice = remaining.slice(0, maxLength + 1);
    const splitAt = findBreak(slice, maxLength);

    chunks.push(remaining.slice(0, splitAt).trimEnd());
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}

function findBreak(slice: string, maxLength: number): number {
  const minimum = maxLength * 0.3;

  const paraIdx = slice.lastIndexOf("\n\n");
  if (paraIdx > minimum) return paraIdx;

  const newlineIdx = slice.lastIndexOf("\n");
  if (newlineIdx > minimum) return newlineIdx;

  const spaceIdx = slice.lastIndexOf(" ");
  if (spaceIdx > 0) return spaceIdx;

  return maxLength;
}

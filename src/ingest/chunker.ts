// pattern: Functional Core

/**
 * Sentence-based text chunking with overlap.
 */

// split after terminal punctuation followed by whitespace, keeping abbreviations like "e.g." intact
const SENTENCE_BOUNDARY = /(?<!\b[A-Za-z]\.[A-Za-z]\.)(?<=[.!?])\s+(?=[A-Z"'(\[])/;

export function splitSentences(text: string): Array<string> {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length === 0) {
    return [];
  }
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Group sentences into chunks of at most `size` characters. A sentence longer
 * than `size` becomes a chunk of its own. Each chunk after the first starts
 * with the trailing sentences of the previous one, up to `overlap` characters.
 */
export function chunkText(text: string, size: number, overlap: number): Array<string> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`chunk overlap must be between 0 and ${size - 1}, got ${overlap}`);
  }

  const sentences = splitSentences(text);
  const chunks: Array<string> = [];
  let start = 0;

  while (start < sentences.length) {
    const chunk: Array<string> = [];
    let length = 0;
    let end = start;

    for (; end < sentences.length; end++) {
      const sentence = sentences[end] ?? '';
      const added = chunk.length === 0 ? sentence.length : sentence.length + 1;
      if (chunk.length > 0 && length + added > size) {
        break;
      }
      chunk.push(sentence);
      length += added;
    }

    chunks.push(chunk.join(' '));
    if (end >= sentences.length) {
      break;
    }

    // walk back over trailing sentences that fit in the overlap
    let overlapStart = end;
    let overlapLength = 0;
    while (overlapStart - 1 > start) {
      const sentence = sentences[overlapStart - 1] ?? '';
      const added = overlapLength === 0 ? sentence.length : sentence.length + 1;
      if (overlapLength + added > overlap) {
        break;
      }
      overlapLength += added;
      overlapStart--;
    }

    // an overlap that leaves no room for the next sentence would repeat itself
    const next = sentences[end] ?? '';
    start = overlapLength + 1 + next.length <= size ? overlapStart : end;
  }

  return chunks;
}

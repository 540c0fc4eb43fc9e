export const DEFAULT_MAX_CHARS = 500;
export const DEFAULT_OVERLAP_CHARS = 50;

const SENTENCE_PATTERN = /[^.!?。]+(?:[.!?。]+|$)/g;

export type Chunk = {
  chunkIndex: number;
  content: string;
};

export type ChunkWithMetadata<M extends object> = Chunk & {
  metadata: M;
};

export type ChunkOptions = {
  maxChars?: number;
  overlapChars?: number;
};

export function splitIntoSentences(text: string): string[] {
  const normalizedText = text.replace(/\s+/g, " ").trim();
  if (!normalizedText) {
    return [];
  }

  return (normalizedText.match(SENTENCE_PATTERN) ?? [])
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function overlapSeed(closedChunk: string, overlapChars: number, room: number): string {
  const seedChars = Math.min(overlapChars, room);
  if (seedChars <= 0) {
    return "";
  }

  return closedChunk.slice(-seedChars).trim();
}

/**
 * Packs whole sentences into chunks of at most `maxChars` characters. A chunk that closes seeds the
 * next one with its trailing `overlapChars` characters, as far as the next sentence leaves room.
 *
 * A sentence longer than `maxChars` is never split: it becomes a chunk of its own and is the only
 * case where a chunk exceeds the bound.
 */
export function chunkText(text: string, options: ChunkOptions = {}): Chunk[] {
  const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
  const overlapChars = options.overlapChars ?? DEFAULT_OVERLAP_CHARS;

  if (maxChars <= 0) {
    throw new Error("maxChars must be greater than 0");
  }

  if (overlapChars < 0 || overlapChars >= maxChars) {
    throw new Error("overlapChars must be >= 0 and less than maxChars");
  }

  const sentences = splitIntoSentences(text);
  const chunks: Chunk[] = [];
  let current = "";

  const closeCurrent = () => {
    chunks.push({
      chunkIndex: chunks.length,
      content: current
    });
  };

  for (const sentence of sentences) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= maxChars || !current) {
      current = candidate;
      continue;
    }

    closeCurrent();
    const seed = overlapSeed(current, overlapChars, maxChars - sentence.length - 1);
    current = seed ? `${seed} ${sentence}` : sentence;
  }

  if (current) {
    closeCurrent();
  }

  return chunks;
}

export function chunkDocument<M extends object>(
  text: string,
  metadata: M,
  options: ChunkOptions = {}
): Array<ChunkWithMetadata<M>> {
  return chunkText(text, options).map((chunk) => ({
    ...chunk,
    metadata: { ...metadata }
  }));
}

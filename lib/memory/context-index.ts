import { createHash } from 'node:crypto';
import { describeError } from '../shared/errors';
import { logger as defaultLogger, type Logger } from '../shared/logger';

export interface TextChunk {
  /** Hash of source, offset and content */
  id: string;
  sourceId: string;
  /** Exactly `fullText.slice(startOffset, endOffset)` */
  content: string;
  startOffset: number;
  endOffset: number;
  sequenceIndex: number;
}

/** Turns texts into vectors; cosine similarity ranks chunks against a query. */
export interface SimilarityBackend {
  embed(texts: readonly string[]): Promise<number[][]>;
}

export type RetrievalMode = 'similarity' | 'sequence';

export interface Retrieval {
  chunks: TextChunk[];
  mode: RetrievalMode;
}

export interface ContextIndexOptions {
  /** Window size in characters. Defaults to 500. */
  chunkSize?: number;
  /** Characters shared by adjacent chunks. Defaults to 50. */
  chunkOverlap?: number;
  /** Chunks returned per query. Defaults to 3. */
  maxChunksPerQuery?: number;
  /** Characters per size unit (roughly one token). Defaults to 4. */
  charsPerUnit?: number;
  /** Without one, retrieval is always in sequence order. */
  similarity?: SimilarityBackend;
  logger?: Logger;
}

export interface ContextIndexStats {
  sources: number;
  chunks: number;
  averageChunksPerSource: number;
  similarityEnabled: boolean;
  embeddedSources: number;
}

interface IndexedSource {
  fullText: string;
  chunks: TextChunk[];
  /** Parallel to `chunks`; absent when embedding was unavailable */
  vectors?: number[][];
}

export const CHUNK_SEPARATOR = '\n\n';
export const TRUNCATION_MARKER = '...';

/**
 * Bounded-context store for long character backgrounds.
 *
 * Each source is split into overlapping chunks once, when added. A query
 * returns the few chunks most similar to the question (or the first few, when
 * similarity is unavailable), capped at a size budget.
 *
 * Re-adding a source replaces its chunks wholesale. Replacement is a single
 * synchronous swap after any embedding work, and a slower, older `addSource`
 * for the same id never overwrites a newer one. Queries work on the chunk set
 * they found when they started.
 */
export class ContextIndex {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly maxChunksPerQuery: number;
  readonly charsPerUnit: number;

  #similarity?: SimilarityBackend;
  #logger: Logger;
  #sources = new Map<string, IndexedSource>();
  /** Latest revision per live or pending source; revisions never repeat */
  #revisions = new Map<string, number>();
  #lastRevision = 0;

  constructor(options: ContextIndexOptions = {}) {
    this.chunkSize = options.chunkSize ?? 500;
    this.chunkOverlap = options.chunkOverlap ?? 50;
    this.maxChunksPerQuery = options.maxChunksPerQuery ?? 3;
    this.charsPerUnit = options.charsPerUnit ?? 4;
    this.#similarity = options.similarity;
    this.#logger = options.logger ?? defaultLogger;

    assertChunking(this.chunkSize, this.chunkOverlap);
  }

  /**
   * Index `fullText` under `sourceId`, replacing any previous chunks.
   * Extra labelled fields are appended as `label: value` paragraphs.
   */
  async addSource(
    sourceId: string,
    fullText: string,
    additionalContext: Record<string, string> = {},
  ): Promise<TextChunk[]> {
    const revision = this.#bump(sourceId);

    let text = fullText;
    for (const [label, value] of Object.entries(additionalContext)) {
      text += `${CHUNK_SEPARATOR}${label}: ${value}`;
    }

    const chunks = chunkText(text, sourceId, this.chunkSize, this.chunkOverlap);
    const vectors = await this.#embedChunks(sourceId, chunks);

    if (this.#revisions.get(sourceId) !== revision) {
      this.#logger.debug('context_source_superseded', { sourceId, revision });
      return this.#sources.get(sourceId)?.chunks ?? [];
    }

    this.#sources.set(sourceId, { fullText: text, chunks, vectors });
    this.#logger.debug('context_source_indexed', {
      sourceId,
      chunks: chunks.length,
      embedded: vectors !== undefined,
    });
    return chunks;
  }

  /** Ranked chunks for a query, or null when the source was never added. */
  async retrieve(sourceId: string, queryText: string, k: number = this.maxChunksPerQuery): Promise<Retrieval | null> {
    const source = this.#sources.get(sourceId);
    if (!source) return null;

    if (this.#similarity && source.vectors) {
      const ranked = await this.#rank(sourceId, source, queryText, k);
      if (ranked) return { chunks: ranked, mode: 'similarity' };
    }

    return { chunks: source.chunks.slice(0, k), mode: 'sequence' };
  }

  /**
   * Relevant context for `queryText`, at most `maxSize` units long (plus the
   * truncation marker). Empty when the source is unknown; callers then use the
   * full text themselves.
   */
  async query(sourceId: string, queryText: string, maxSize: number): Promise<string> {
    const retrieval = await this.retrieve(sourceId, queryText);
    if (!retrieval) return '';

    const maxChars = maxSize * this.charsPerUnit;
    const combined = retrieval.chunks.map((chunk) => chunk.content).join(CHUNK_SEPARATOR);
    if (combined.length > maxChars) {
      return combined.slice(0, maxChars) + TRUNCATION_MARKER;
    }
    return combined;
  }

  /** Also orphans any pending `addSource` for the id, since its revision is gone. */
  removeSource(sourceId: string): boolean {
    this.#revisions.delete(sourceId);
    return this.#sources.delete(sourceId);
  }

  clear(): void {
    this.#revisions.clear();
    this.#sources.clear();
  }

  has(sourceId: string): boolean {
    return this.#sources.has(sourceId);
  }

  /** The indexed text exactly as chunked, or '' for an unknown source. */
  fullContext(sourceId: string): string {
    return this.#sources.get(sourceId)?.fullText ?? '';
  }

  chunks(sourceId: string): readonly TextChunk[] {
    return this.#sources.get(sourceId)?.chunks ?? [];
  }

  stats(): ContextIndexStats {
    const sources = [...this.#sources.values()];
    const chunks = sources.reduce((sum, source) => sum + source.chunks.length, 0);
    return {
      sources: sources.length,
      chunks,
      averageChunksPerSource: sources.length > 0 ? chunks / sources.length : 0,
      similarityEnabled: this.#similarity !== undefined,
      embeddedSources: sources.filter((source) => source.vectors !== undefined).length,
    };
  }

  #bump(sourceId: string): number {
    const revision = ++this.#lastRevision;
    this.#revisions.set(sourceId, revision);
    return revision;
  }

  async #embedChunks(sourceId: string, chunks: TextChunk[]): Promise<number[][] | undefined> {
    if (!this.#similarity || chunks.length === 0) return undefined;
    try {
      const vectors = await this.#similarity.embed(chunks.map((chunk) => chunk.content));
      if (vectors.length !== chunks.length) {
        throw new Error(`expected ${chunks.length} vectors, got ${vectors.length}`);
      }
      return vectors;
    } catch (err) {
      this.#logger.warn('retrieval_unavailable', { sourceId, stage: 'index', error: describeError(err) });
      return undefined;
    }
  }

  async #rank(sourceId: string, source: IndexedSource, queryText: string, k: number): Promise<TextChunk[] | null> {
    const { vectors } = source;
    if (!this.#similarity || !vectors) return null;

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.#similarity.embed([queryText]);
    } catch (err) {
      this.#logger.warn('retrieval_unavailable', { sourceId, stage: 'query', error: describeError(err) });
      return null;
    }
    if (!queryVector) return null;

    const target = queryVector;
    return source.chunks
      .map((chunk, index) => ({ chunk, score: cosineSimilarity(target, vectors[index]) }))
      .sort((a, b) => b.score - a.score || a.chunk.sequenceIndex - b.chunk.sequenceIndex)
      .slice(0, k)
      .map(({ chunk }) => chunk);
  }
}

// ── Chunking ─────────────────────────────────────────────────────────

/**
 * Split `text` into windows of at most `chunkSize` characters.
 *
 * A window that stops mid-text is pulled back to just after the last ". "
 * inside it, else to the last whitespace, else left at the raw edge. The next
 * window starts `chunkOverlap` characters before the previous end, but always
 * strictly after the previous start. Whitespace-only windows are skipped, so
 * offsets inside a whitespace run longer than a window may fall in no chunk.
 */
export function chunkText(text: string, sourceId: string, chunkSize: number, chunkOverlap: number): TextChunk[] {
  assertChunking(chunkSize, chunkOverlap);

  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const sentenceEnd = text.lastIndexOf('. ', end - 2);
      if (sentenceEnd > start) {
        end = sentenceEnd + 1;
      } else {
        const wordEnd = lastWhitespace(text, start, end);
        if (wordEnd > start) end = wordEnd;
      }
    }

    const content = text.slice(start, end);
    if (content.trim()) {
      chunks.push({
        id: chunkId(sourceId, start, content),
        sourceId,
        content,
        startOffset: start,
        endOffset: end,
        sequenceIndex: chunks.length,
      });
    }

    if (end >= text.length) break;

    const next = end - chunkOverlap;
    start = next > start ? next : end;
  }

  return chunks;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function lastWhitespace(text: string, start: number, end: number): number {
  for (let i = end - 1; i > start; i--) {
    if (/\s/.test(text[i])) return i;
  }
  return -1;
}

function chunkId(sourceId: string, start: number, content: string): string {
  return createHash('sha256').update(`${sourceId}\u0000${start}\u0000${content}`).digest('hex').slice(0, 16);
}

function assertChunking(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be in [0, chunkSize), got ${chunkOverlap}`);
  }
}

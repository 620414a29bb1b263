/**
 * Topical table search. Each session indexes its own corpus (one document
 * per table) at connect time; questions are matched against it.
 */

export interface CorpusDocument {
  table: string;
  columns: string[];
  /** Free text describing the table, usually its CREATE statement */
  text: string;
}

export interface TableSearch {
  index(corpusId: string, docs: CorpusDocument[]): Promise<void>;
  topK(query: string, k: number, corpusId: string): Promise<string[]>;
  drop(corpusId: string): Promise<void>;
}

export class UnknownCorpusError extends Error {
  constructor(corpusId: string) {
    super(`No table corpus indexed for "${corpusId}".`);
    this.name = 'UnknownCorpusError';
  }
}

// ── Keyword search ───────────────────────────────────────────────────

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens.
 * Supports matching against underscore-separated parts too.
 */
export function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

/** Table name score plus its three best column scores. */
export function scoreDocument(doc: CorpusDocument, tokens: string[]): number {
  const colBoost = doc.columns
    .map((col) => scoreMatch(col, tokens))
    .sort((a, b) => b - a)
    .slice(0, 3)
    .reduce((sum, s) => sum + s, 0);
  return scoreMatch(doc.table, tokens) + colBoost;
}

/**
 * Token-overlap search over table and column names. Tables scoring zero
 * are never returned.
 */
export class KeywordTableSearch implements TableSearch {
  private readonly corpora = new Map<string, CorpusDocument[]>();

  async index(corpusId: string, docs: CorpusDocument[]): Promise<void> {
    this.corpora.set(corpusId, [...docs]);
  }

  async topK(query: string, k: number, corpusId: string): Promise<string[]> {
    const docs = this.corpora.get(corpusId);
    if (!docs) throw new UnknownCorpusError(corpusId);
    const tokens = tokenize(query);
    return docs
      .map((doc, position) => ({ table: doc.table, score: scoreDocument(doc, tokens), position }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map((entry) => entry.table);
  }

  async drop(corpusId: string): Promise<void> {
    this.corpora.delete(corpusId);
  }
}

// ── Embedding search ─────────────────────────────────────────────────

export type EmbedFn = (texts: string[]) => Promise<number[][]>;

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Dense-vector search; vectors for each corpus stay in memory. */
export class EmbeddingTableSearch implements TableSearch {
  private readonly corpora = new Map<string, Array<{ table: string; vector: number[] }>>();

  constructor(private readonly embed: EmbedFn) {}

  async index(corpusId: string, docs: CorpusDocument[]): Promise<void> {
    if (docs.length === 0) {
      this.corpora.set(corpusId, []);
      return;
    }
    const vectors = await this.embed(docs.map((doc) => doc.text));
    if (vectors.length !== docs.length) {
      throw new Error(`Embedding count mismatch: expected ${docs.length}, got ${vectors.length}.`);
    }
    this.corpora.set(
      corpusId,
      docs.map((doc, i) => ({ table: doc.table, vector: vectors[i] })),
    );
  }

  async topK(query: string, k: number, corpusId: string): Promise<string[]> {
    const entries = this.corpora.get(corpusId);
    if (!entries) throw new UnknownCorpusError(corpusId);
    if (entries.length === 0) return [];
    const [queryVector] = await this.embed([query]);
    if (!queryVector) return [];
    return entries
      .map((entry, position) => ({ table: entry.table, score: cosineSimilarity(queryVector, entry.vector), position }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map((entry) => entry.table);
  }

  async drop(corpusId: string): Promise<void> {
    this.corpora.delete(corpusId);
  }
}

import type { LexicalIndex } from "./types.js";
import { tokenize } from "./tokenize.js";

const K1 = 1.5;
const B = 0.75;

interface IndexedDoc {
  length: number;
  termFreq: Map<string, number>;
  /** Insertion sequence; breaks score ties. */
  seq: number;
}

interface Corpus {
  docs: Map<string, IndexedDoc>;
  docFreq: Map<string, number>;
  totalLength: number;
  nextSeq: number;
}

/**
 * In-process Okapi BM25 index, one corpus per user. Updated incrementally;
 * re-indexing an id replaces its previous text.
 */
export class Bm25Index implements LexicalIndex {
  private corpora = new Map<string, Corpus>();

  private corpus(userId: string): Corpus {
    let corpus = this.corpora.get(userId);
    if (!corpus) {
      corpus = { docs: new Map(), docFreq: new Map(), totalLength: 0, nextSeq: 0 };
      this.corpora.set(userId, corpus);
    }
    return corpus;
  }

  async index(userId: string, id: string, text: string): Promise<void> {
    const corpus = this.corpus(userId);
    const previous = corpus.docs.get(id);
    if (previous) this.removeDoc(corpus, previous);

    const tokens = tokenize(text);
    const termFreq = new Map<string, number>();
    for (const t of tokens) termFreq.set(t, (termFreq.get(t) ?? 0) + 1);
    for (const term of termFreq.keys()) {
      corpus.docFreq.set(term, (corpus.docFreq.get(term) ?? 0) + 1);
    }
    corpus.totalLength += tokens.length;
    corpus.docs.set(id, {
      length: tokens.length,
      termFreq,
      seq: previous ? previous.seq : corpus.nextSeq++,
    });
  }

  async search(userId: string, text: string, topK: number): Promise<string[]> {
    return this.scores(userId, text)
      .slice(0, Math.max(0, topK))
      .map((s) => s.id);
  }

  async clear(userId: string): Promise<void> {
    this.corpora.delete(userId);
  }

  size(userId: string): number {
    return this.corpora.get(userId)?.docs.size ?? 0;
  }

  /** Documents with a positive score, best first. */
  scores(userId: string, text: string): Array<{ id: string; score: number }> {
    const corpus = this.corpora.get(userId);
    if (!corpus || corpus.docs.size === 0) return [];

    const queryTerms = [...new Set(tokenize(text))];
    if (queryTerms.length === 0) return [];

    const n = corpus.docs.size;
    const avgLength = corpus.totalLength / n || 1;
    const scored: Array<{ id: string; score: number; seq: number }> = [];

    for (const [id, doc] of corpus.docs) {
      let score = 0;
      for (const term of queryTerms) {
        const tf = doc.termFreq.get(term) ?? 0;
        if (tf === 0) continue;
        const df = corpus.docFreq.get(term) ?? 0;
        const idf = Math.log((n - df + 0.5) / (df + 0.5) + 1);
        score += (idf * tf * (K1 + 1)) / (tf + K1 * (1 - B + (B * doc.length) / avgLength));
      }
      if (score > 0) scored.push({ id, score, seq: doc.seq });
    }

    scored.sort((a, b) => (b.score !== a.score ? b.score - a.score : a.seq - b.seq));
    return scored.map(({ id, score }) => ({ id, score }));
  }

  private removeDoc(corpus: Corpus, doc: IndexedDoc): void {
    corpus.totalLength -= doc.length;
    for (const term of doc.termFreq.keys()) {
      const df = (corpus.docFreq.get(term) ?? 1) - 1;
      if (df <= 0) corpus.docFreq.delete(term);
      else corpus.docFreq.set(term, df);
    }
  }
}

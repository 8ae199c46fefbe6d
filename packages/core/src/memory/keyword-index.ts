import stopWords from './stop-words.json' with { type: 'json' };

const STOP_WORDS: ReadonlySet<string> = new Set(stopWords);

// Scripts written without spaces between words.
const UNSPACED_RUN = /([\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}]+)/u;

/**
 * Lowercased terms in any script, punctuation stripped, stop words and
 * single characters dropped. Runs of CJK text become overlapping bigrams.
 */
export function tokenize(text: string): string[] {
  const terms: string[] = [];
  const words = text
    .normalize('NFC')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s_-]/gu, ' ')
    .split(/\s+/);

  for (const word of words) {
    for (const piece of word.split(UNSPACED_RUN)) {
      if (!piece) continue;
      if (UNSPACED_RUN.test(piece)) {
        terms.push(...bigrams(piece));
      } else if (Array.from(piece).length > 1 && !STOP_WORDS.has(piece)) {
        terms.push(piece);
      }
    }
  }
  return terms;
}

function bigrams(run: string): string[] {
  const chars = Array.from(run);
  if (chars.length === 1) return chars;
  const out: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    out.push(chars[i] + chars[i + 1]);
  }
  return out;
}

/** Share of the distinct query terms that also occur in the document, in [0, 1]. */
export function overlapScore(queryTerms: ReadonlySet<string>, docTerms: ReadonlySet<string>): number {
  if (queryTerms.size === 0) return 0;
  let shared = 0;
  for (const term of queryTerms) {
    if (docTerms.has(term)) shared++;
  }
  return shared / queryTerms.size;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const CJK_RUN = /^[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}]+$/u;

export type QuestionIntent = "statistical" | "evolution" | "general";

const STATISTICAL_PATTERNS = [
  /\bhow (many|often)\b/,
  /\b(count|frequency|number of times|mentions?|mentioned|occurrences?|list all)\b/,
  /(多少次|频率|出现|提及|次数|提了|说了|几次|统计|计数|列举|所有)/u,
];

const EVOLUTION_PATTERNS = [
  /\b(evolv\w*|chang\w*|shift\w*|trend\w*|over time|over the years)\b/,
  /\bfrom (19|20)\d{2}\b.+\bto\b/,
  /(变化|转变|演变|趋势|看法变|观点变)/u,
  /从.+到/u,
];

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

/** Canonical form of a question, used for cache keys. */
export function normalizeQuestion(question: string): string {
  return question
    .normalize("NFKC")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[\s?？!！.。]+$/u, "")
    .trim();
}

export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

/** Word tokens with repeats kept, for term frequencies. */
export function tokenizeForBm25(text: string): string[] {
  const words = text.normalize("NFKC").toLowerCase().match(WORD_REGEX) ?? [];
  return words.flatMap(wordVariants);
}

/**
 * Cosine-style token overlap, or the character-bigram Jaccard score (damped)
 * when that is higher. Keeps short or unspaced queries from scoring zero.
 */
export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  const targetTokens = new Set(tokenize(target));
  if (queryTokens.size === 0 || targetTokens.size === 0) {
    return 0;
  }

  const tokenScore = countShared(queryTokens, targetTokens) / Math.sqrt(queryTokens.size * targetTokens.size);
  return Math.max(tokenScore, bigramJaccard(query, target.slice(0, 1200)) * 0.85);
}

export function classifyQuestion(question: string): QuestionIntent {
  const q = question.toLowerCase();

  if (STATISTICAL_PATTERNS.some((pattern) => pattern.test(q))) {
    return "statistical";
  }
  if (EVOLUTION_PATTERNS.some((pattern) => pattern.test(q))) {
    return "evolution";
  }
  return "general";
}

/** First four-digit year (1900-2099) in a file name, or null. */
export function extractYear(filename: string): number | null {
  const match = /(19\d{2}|20\d{2})/.exec(filename);
  return match ? Number(match[1]) : null;
}

export function truncate(text: string, maxChars: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, Math.max(0, maxChars - 3))}...`;
}

function wordVariants(word: string): string[] {
  // CJK text has no spaces; index character bigrams so partial phrases match.
  if (CJK_RUN.test(word)) {
    return word.length <= 2 ? [word] : [...slidingGrams(word, 2)];
  }
  if (/[^\x00-\x7f]/.test(word)) {
    return [word];
  }
  if (word.length < 2) {
    return [];
  }
  // naive plural folding: "reports" also indexes "report"
  return word.length >= 4 && /[^s]s$/.test(word) ? [word, word.slice(0, -1)] : [word];
}

function bigramJaccard(left: string, right: string): number {
  const a = new Set(slidingGrams(compact(left), 2));
  const b = new Set(slidingGrams(compact(right), 2));
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  const shared = countShared(a, b);
  return shared / (a.size + b.size - shared);
}

function compact(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

function* slidingGrams(text: string, n: number): Generator<string> {
  for (let i = 0; i + n <= text.length; i += 1) {
    yield text.slice(i, i + n);
  }
}

function countShared<T>(a: Set<T>, b: Set<T>): number {
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) {
      shared += 1;
    }
  }
  return shared;
}

/**
 * Vocabulary entries are either a single word or a set of equivalent words
 * ("day" vs ["day", "days"]). Profiles store the tagged form; matching code
 * only ever sees {@link wordsOf}.
 */
export type WordOrSet =
  | { kind: "word"; word: string }
  | { kind: "set"; words: readonly string[] };

export function toWordOrSet(raw: string | readonly string[]): WordOrSet {
  if (typeof raw === "string") return { kind: "word", word: raw };
  if (raw.length === 1) return { kind: "word", word: raw[0] };
  return { kind: "set", words: [...raw] };
}

export function wordsOf(entry: WordOrSet | undefined): ReadonlySet<string> {
  if (!entry) return new Set();
  if (entry.kind === "word") return new Set([entry.word]);
  return new Set(entry.words);
}

export function listWords(...entries: (WordOrSet | undefined)[]): string[] {
  const out = new Set<string>();
  for (const entry of entries) {
    for (const w of wordsOf(entry)) out.add(w);
  }
  return [...out];
}

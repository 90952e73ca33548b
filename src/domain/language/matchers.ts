import { LanguageProfile } from "./languageProfiles";
import { listWords, wordsOf } from "./wordSet";

export type TimeWordReplacement = {
  pattern: RegExp;
  replacement: string;
};

export type ProfileMatchers = {
  noise: RegExp | null;
  at: RegExp;
  leadingOn: RegExp | null;
  timeWords: TimeWordReplacement[];
  today: ReadonlySet<string>;
  tomorrow: ReadonlySet<string>;
  phrases: [phrase: string, dayOffset: number][];
  relativeDays: RegExp | null;
  relativeDuration: RegExp | null;
  numberWords: ReadonlyMap<string, number>;
  weekdays: ReadonlyMap<string, number>;
  weekday: RegExp;
  months: ReadonlyMap<string, number>;
  dayMonth: RegExp;
  monthDay: RegExp;
};

const BEFORE = "(?<![\\p{L}\\p{N}])";
const AFTER = "(?![\\p{L}\\p{N}])";

// Ordinal suffixes across the shipped languages: 1st, 2nd, 5th, 5e, 1er, 1ste, 5.
const DAY_NUMBER = "(\\d{1,2})(?:st|nd|rd|th|ste|de|er|e)?\\.?";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function byLengthDesc(a: string, b: string): number {
  return b.length - a.length;
}

/** Alternation that only matches whole words, longest alternative first. */
export function wholeWords(words: Iterable<string>): string {
  const alts = [...new Set(words)].sort(byLengthDesc).map(escapeRegExp);
  return `${BEFORE}(?:${alts.join("|")})${AFTER}`;
}

function optionalWholeWords(words: string[], flags: string): RegExp | null {
  if (words.length === 0) return null;
  return new RegExp(wholeWords(words), flags);
}

function monthTable(months: readonly string[]): Map<string, number> {
  const table = new Map<string, number>();
  months.forEach((m, i) => table.set(m, i + 1));

  // Three-letter abbreviations, when they are unambiguous within the language.
  const abbrevCounts = new Map<string, number>();
  for (const m of months) {
    const key = m.slice(0, 3);
    abbrevCounts.set(key, (abbrevCounts.get(key) ?? 0) + 1);
  }
  months.forEach((m, i) => {
    const key = m.slice(0, 3);
    if (abbrevCounts.get(key) === 1 && !table.has(key)) table.set(key, i + 1);
  });
  return table;
}

function timeWordReplacements(profile: LanguageProfile): TimeWordReplacement[] {
  const t = profile.time;
  const entries: [string, string][] = [];
  for (const w of wordsOf(t.noon)) entries.push([w, " 12:00 "]);
  for (const w of wordsOf(t.midnight)) entries.push([w, " 0:00 "]);
  for (const w of listWords(t.am, t.morning)) entries.push([w, " am "]);
  for (const w of listWords(t.pm, t.afternoon, t.evening, t.night)) entries.push([w, " pm "]);
  for (const w of listWords(t.at, t.hour)) entries.push([w, " "]);

  // Longest phrase first so "in the morning" wins over "morning".
  const out: TimeWordReplacement[] = [];
  const seen = new Set<string>();
  for (const [w, replacement] of entries.sort(([a], [b]) => byLengthDesc(a, b))) {
    if (seen.has(w)) continue;
    seen.add(w);
    out.push({ pattern: new RegExp(`${BEFORE}${escapeRegExp(w)}${AFTER}`, "gu"), replacement });
  }
  return out;
}

function compile(profile: LanguageProfile): ProfileMatchers {
  const r = profile.relative;
  const numberWords = new Map(Object.entries(r.numbers));
  const count = numberWords.size ? `(\\d+|${wholeWords(numberWords.keys())})` : "(\\d+)";

  const inWords = listWords(r.in);
  const dayWords = listWords(r.day, r.days, r.week, r.weeks);
  const durationWords = listWords(r.seconds, r.minutes, r.hours);
  const nextWords = listWords(r.next);
  // A group that never matches keeps capture indexes stable for profiles without "next" words.
  const nextAlt = nextWords.length ? `(${wholeWords(nextWords)})` : "((?!))";

  const weekdays = new Map(profile.weekdays.map((d, i): [string, number] => [d, i + 1]));
  const months = monthTable(profile.months);
  const monthAlt = `(${wholeWords(months.keys())})`;

  return {
    noise: optionalWholeWords([...profile.prepositions, ...profile.noise], "gu"),
    at: new RegExp(wholeWords(wordsOf(profile.time.at)), "u"),
    leadingOn: r.on ? new RegExp(`^${wholeWords(wordsOf(r.on))}\\s*`, "u") : null,
    timeWords: timeWordReplacements(profile),
    today: wordsOf(r.today),
    tomorrow: wordsOf(r.tomorrow),
    phrases: Object.entries(r.phrases).sort(([a], [b]) => byLengthDesc(a, b)),
    relativeDays:
      inWords.length && dayWords.length
        ? new RegExp(`${wholeWords(inWords)}\\s+${count}\\s+(${wholeWords(dayWords)})`, "u")
        : null,
    relativeDuration:
      inWords.length && durationWords.length
        ? new RegExp(`${wholeWords(inWords)}\\s+${count}\\s+(${wholeWords(durationWords)})`, "u")
        : null,
    numberWords,
    weekdays,
    weekday: new RegExp(`^(?:${nextAlt}\\s+)?(${wholeWords(weekdays.keys())})(?:\\s+${nextAlt})?$`, "u"),
    months,
    dayMonth: new RegExp(`^${DAY_NUMBER}\\s+${monthAlt}(?:\\s+(\\d{4}))?$`, "u"),
    monthDay: new RegExp(`^${monthAlt}\\s+${DAY_NUMBER}(?:,?\\s+(\\d{4}))?$`, "u")
  };
}

// Write-once per language code; profiles never change after load.
const cache = new Map<string, ProfileMatchers>();

export function getMatchers(profile: LanguageProfile): ProfileMatchers {
  const cached = cache.get(profile.code);
  if (cached) return cached;
  const compiled = compile(profile);
  cache.set(profile.code, compiled);
  return compiled;
}

/** Reads "3" or a spelled-out number word; null when it is neither or too large to count. */
export function readCount(m: ProfileMatchers, raw: string): number | null {
  if (/^\d+$/.test(raw)) {
    const n = Number(raw);
    return Number.isSafeInteger(n) ? n : null;
  }
  return m.numberWords.get(raw) ?? null;
}

import { DateTime } from "luxon";
import { LanguageProfile } from "../language/languageProfiles";
import { getMatchers, ProfileMatchers, readCount } from "../language/matchers";
import { listWords } from "../language/wordSet";
import { EmptyInputError, InvalidDateFormatError } from "./errors";
import { basicNormalize } from "./normalizeInput";

const NUMERIC_DATE = /(?<!\d)(\d{1,2})[-/. ](\d{1,2})(?:[-/. ](\d{4}|\d{2}))?(?!\d)/g;

/** Rejects arithmetic that left the four-digit calendar ("in 9999999 days"). */
export function ensureCalendarRange(date: DateTime, input: string): DateTime {
  if (!date.isValid || !(date.year >= 1 && date.year <= 9999)) throw new InvalidDateFormatError(input);
  return date;
}

function rollForwardIfPast(date: DateTime, reference: DateTime): DateTime {
  return date < reference ? date.plus({ years: 1 }) : date;
}

// A bare weekday never means today: the same weekday resolves to a week ahead.
function nextWeekday(reference: DateTime, weekday: number): DateTime {
  let daysAhead = (weekday + 7 - reference.weekday) % 7;
  if (daysAhead === 0) daysAhead = 7;
  return reference.plus({ days: daysAhead });
}

function relativeDays(text: string, profile: LanguageProfile, m: ProfileMatchers): number | null {
  const match = m.relativeDays?.exec(text);
  if (!match) return null;
  const count = readCount(m, match[1]);
  if (count === null) return null;
  const weekWords = listWords(profile.relative.week, profile.relative.weeks);
  return weekWords.includes(match[2]) ? count * 7 : count;
}

function namedMonthDate(text: string, m: ProfileMatchers, reference: DateTime): DateTime | null {
  let day: string;
  let monthName: string;
  let year: string | undefined;

  const dm = m.dayMonth.exec(text);
  const md = dm ? null : m.monthDay.exec(text);
  if (dm) {
    [, day, monthName, year] = dm;
  } else if (md) {
    [, monthName, day, year] = md;
  } else {
    return null;
  }

  const month = m.months.get(monthName);
  if (!month) return null;

  const date = DateTime.fromObject(
    { year: year ? Number(year) : reference.year, month, day: Number(day) },
    { zone: reference.zone }
  );
  // "31 april" names a month we understood, so this is a hard failure.
  if (!date.isValid) throw new InvalidDateFormatError(text);
  return rollForwardIfPast(date, reference);
}

function numericDate(text: string, reference: DateTime): DateTime | null {
  for (const match of text.matchAll(NUMERIC_DATE)) {
    const day = Number(match[1]);
    const month = Number(match[2]);
    const yearRaw = match[3];
    const year = yearRaw ? (yearRaw.length === 2 ? 2000 + Number(yearRaw) : Number(yearRaw)) : reference.year;

    const date = DateTime.fromObject({ year, month, day }, { zone: reference.zone });
    if (!date.isValid) continue;
    return rollForwardIfPast(date, reference);
  }
  return null;
}

/**
 * Resolves a date fragment against the reference day. Rules are tried in
 * order: today/tomorrow words, fixed phrases ("overmorgen"), "in N days",
 * weekdays, "5 january" / "january 5", then numeric day-month[-year].
 */
export function parseCalendarDate(
  fragment: string,
  profile: LanguageProfile,
  referenceDate: DateTime
): DateTime {
  const text = basicNormalize(fragment);
  if (!text) throw new EmptyInputError();

  const m = getMatchers(profile);
  const reference = referenceDate.startOf("day");

  if (m.today.has(text)) return reference;
  if (m.tomorrow.has(text)) return reference.plus({ days: 1 });

  for (const [phrase, offset] of m.phrases) {
    if (text.includes(phrase)) return reference.plus({ days: offset });
  }

  const days = relativeDays(text, profile, m);
  if (days !== null) return ensureCalendarRange(reference.plus({ days }), fragment);

  const weekdayMatch = m.weekday.exec(text);
  if (weekdayMatch) {
    const weekday = m.weekdays.get(weekdayMatch[2]);
    if (weekday) return nextWeekday(reference, weekday);
  }

  const named = namedMonthDate(text, m, reference);
  if (named) return named;

  const numeric = numericDate(text, reference);
  if (numeric) return numeric;

  throw new InvalidDateFormatError(fragment);
}

import { DateTime } from "luxon";
import { getProfile, LanguageProfile, ProfileLogger } from "../language/languageProfiles";
import { getMatchers, readCount } from "../language/matchers";
import { listWords } from "../language/wordSet";
import { DateTimeParseError, EmptyInputError, InvalidTimeFormatError } from "./errors";
import { ensureCalendarRange, parseCalendarDate } from "./parseCalendarDate";
import { basicNormalize, normalizeAndSplit, normalizeTimeFragment } from "./normalizeInput";
import { formatTimeOfDay, parseTimeOfDay, TimeOfDay } from "./parseTimeOfDay";

export type ParsedDateTime = {
  /** Start of the resolved day, in the zone of the reference time. */
  date: DateTime;
  time: TimeOfDay;
  language: string;
};

export type ParseAlarmExpressionOpts = {
  now?: DateTime;
  logger?: ProfileLogger;
};

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0, second: 0 };

// "12/12", "1-5-25": digits joined by a dash or slash never form a clock time.
const SLASHED_DATE = /\d[-/]\d/;
// "10.12" names a real day and month; "14.30" and "7.45" cannot, so they stay times.
const DOTTED_DATE = /(?<!\d)(\d{1,2})\.(\d{1,2})(?!\d)/;

function readsAsNumericDate(text: string): boolean {
  if (SLASHED_DATE.test(text)) return true;
  const dotted = DOTTED_DATE.exec(text);
  if (!dotted) return false;
  const day = Number(dotted[1]);
  const month = Number(dotted[2]);
  return day >= 1 && day <= 31 && month >= 1 && month <= 12;
}

function tryParseTime(fragment: string, profile: LanguageProfile): TimeOfDay | null {
  try {
    return parseTimeOfDay(normalizeTimeFragment(fragment, profile));
  } catch (err) {
    if (err instanceof InvalidTimeFormatError) return null;
    throw err;
  }
}

/** The am/pm marker a period word ("tonight", "tomorrow evening") puts on a date fragment. */
function periodOf(dateFragment: string, profile: LanguageProfile): "am" | "pm" | null {
  const tokens = normalizeTimeFragment(dateFragment, profile).split(" ");
  if (tokens.includes("pm")) return "pm";
  if (tokens.includes("am")) return "am";
  return null;
}

function parseTimeFragment(timeFragment: string, dateFragment: string, profile: LanguageProfile): TimeOfDay | null {
  const period = periodOf(dateFragment, profile);
  const withPeriod = period ? tryParseTime(`${timeFragment} ${period}`, profile) : null;
  return withPeriod ?? tryParseTime(timeFragment, profile);
}

function clockOf(dt: DateTime): TimeOfDay {
  return { hour: dt.hour, minute: dt.minute, second: 0 };
}

type RelativeMoment = {
  at: DateTime;
  // Second counts keep their seconds.
  keepSeconds: boolean;
};

// "in 10 minutes", "over 2 uur", "over 30 seconden"
function relativeDuration(text: string, profile: LanguageProfile, now: DateTime): RelativeMoment | null {
  const m = getMatchers(profile);
  const match = m.relativeDuration?.exec(basicNormalize(text));
  if (!match) return null;
  const count = readCount(m, match[1]);
  if (count === null) return null;

  const r = profile.relative;
  const inSeconds = listWords(r.seconds).includes(match[2]);
  const unit = listWords(r.hours).includes(match[2])
    ? { hours: count }
    : inSeconds
      ? { seconds: count }
      : { minutes: count };
  return { at: ensureCalendarRange(now.plus(unit), text), keepSeconds: inSeconds };
}

/**
 * Resolves a free-form alarm expression ("7pm", "overmorgen om 9",
 * "5 january at 14:30") into a date and a time of day.
 *
 * `now` is read once; every relative computation in the call uses it.
 * A date without a usable time gets the current time when it is today and
 * midnight otherwise. A period word in the date part ("tonight at 9") sets
 * am or pm on the time part. A time clause after an unrecognised date falls back to
 * today.
 */
export function parseAlarmExpression(
  text: string,
  language: string,
  opts: ParseAlarmExpressionOpts = {}
): ParsedDateTime {
  const profile = getProfile(language, opts.logger);
  const now = opts.now ?? DateTime.now();
  const today = now.startOf("day");

  if (!basicNormalize(text)) throw new EmptyInputError();

  const timeOnly = readsAsNumericDate(basicNormalize(text)) ? null : tryParseTime(text, profile);
  if (timeOnly) return { date: today, time: timeOnly, language: profile.code };

  const later = relativeDuration(text, profile, now);
  if (later) {
    const time = later.keepSeconds ? { ...clockOf(later.at), second: later.at.second } : clockOf(later.at);
    return { date: later.at.startOf("day"), time, language: profile.code };
  }

  const { dateFragment, timeFragment } = normalizeAndSplit(text, profile);

  let date: DateTime;
  try {
    date = parseCalendarDate(dateFragment, profile, today);
  } catch (err) {
    if (!(err instanceof DateTimeParseError) || timeFragment === undefined) throw err;
    date = today;
  }

  const explicitTime =
    timeFragment !== undefined
      ? parseTimeFragment(timeFragment, dateFragment, profile)
      : readsAsNumericDate(dateFragment)
        ? null
        : tryParseTime(dateFragment, profile);
  const time = explicitTime ?? (date.hasSame(now, "day") ? clockOf(now) : MIDNIGHT);

  return { date, time, language: profile.code };
}

export function toDateTime(parsed: ParsedDateTime): DateTime {
  return parsed.date.set({
    hour: parsed.time.hour,
    minute: parsed.time.minute,
    second: parsed.time.second,
    millisecond: 0
  });
}

export function formatParsed(parsed: ParsedDateTime): { date: string; time: string; language: string } {
  return {
    date: parsed.date.toISODate() ?? "",
    time: formatTimeOfDay(parsed.time),
    language: parsed.language
  };
}

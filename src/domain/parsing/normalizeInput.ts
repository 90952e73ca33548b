import { LanguageProfile } from "../language/languageProfiles";
import { getMatchers } from "../language/matchers";

export type SplitFragments = {
  dateFragment: string;
  timeFragment?: string;
};

// "tomorrow 7am", "monday 14:30": a trailing clock time needs no "at" word.
const TRAILING_CLOCK_TIME = /^(.*\S)\s+(\d{1,2}(?::\d{2}){1,2}(?:\s?[ap]\.?m\.?)?|\d{1,2}\s?[ap]\.?m\.?)$/;

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function basicNormalize(text: string): string {
  return collapse(text.normalize("NFC").toLowerCase());
}

/**
 * Drops prepositions/noise words and splits "<date> at <time>" on the first
 * "at" word of the language, or before a trailing clock time. Otherwise the
 * whole text is the date fragment.
 */
export function normalizeAndSplit(text: string, profile: LanguageProfile): SplitFragments {
  const m = getMatchers(profile);

  let t = basicNormalize(text);
  if (m.noise) t = collapse(t.replace(m.noise, " "));

  let dateFragment = t;
  let timeFragment: string | undefined;

  const at = m.at.exec(t);
  const tail = at ? null : TRAILING_CLOCK_TIME.exec(t);
  if (at) {
    dateFragment = t.slice(0, at.index).trim();
    timeFragment = t.slice(at.index + at[0].length).trim();
  } else if (tail) {
    dateFragment = tail[1];
    timeFragment = tail[2];
  }

  if (m.leadingOn) dateFragment = dateFragment.replace(m.leadingOn, "").trim();

  return timeFragment === undefined ? { dateFragment } : { dateFragment, timeFragment };
}

/**
 * Rewrites time words into the shapes the time patterns understand
 * ("noon" -> "12:00", "in the evening" -> "pm") and drops the rest ("at",
 * "o'clock"). Tokens carrying a digit keep only digits, colons and a/p/m, so
 * "14.30h" reads as "14:30"; other tokens are left for the patterns to reject.
 */
export function normalizeTimeFragment(text: string, profile: LanguageProfile): string {
  let t = basicNormalize(text);
  for (const { pattern, replacement } of getMatchers(profile).timeWords) {
    t = t.replace(pattern, replacement);
  }

  return t
    .split(" ")
    .map((token) =>
      /\d/.test(token) ? token.replace(/(\d)\.(?=\d)/g, "$1:").replace(/[^0-9:apm]/g, "") : token
    )
    .filter(Boolean)
    .join(" ");
}

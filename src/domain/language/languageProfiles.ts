import { z } from "zod";
import { toWordOrSet } from "./wordSet";
import en from "./profiles/en.json";
import nl from "./profiles/nl.json";
import de from "./profiles/de.json";
import fr from "./profiles/fr.json";

const word = z.string().min(1);
const wordOrSet = z.union([word, z.array(word).min(1)]).transform(toWordOrSet);

const ProfileSchema = z.object({
  code: z.string().min(2),
  name: z.string().min(1),
  weekdays: z.array(word).length(7), // Monday first
  months: z.array(word).length(12),
  prepositions: z.array(word).default([]),
  noise: z.array(word).default([]),
  relative: z.object({
    today: wordOrSet,
    tomorrow: wordOrSet,
    in: wordOrSet.optional(),
    day: wordOrSet.optional(),
    days: wordOrSet.optional(),
    week: wordOrSet.optional(),
    weeks: wordOrSet.optional(),
    next: wordOrSet.optional(),
    on: wordOrSet.optional(),
    seconds: wordOrSet.optional(),
    minutes: wordOrSet.optional(),
    hours: wordOrSet.optional(),
    phrases: z.record(z.number().int().nonnegative()).default({}),
    numbers: z.record(z.number().int().positive()).default({})
  }),
  time: z.object({
    at: wordOrSet,
    am: wordOrSet,
    pm: wordOrSet,
    noon: wordOrSet.optional(),
    midnight: wordOrSet.optional(),
    hour: wordOrSet.optional(),
    morning: wordOrSet.optional(),
    afternoon: wordOrSet.optional(),
    evening: wordOrSet.optional(),
    night: wordOrSet.optional()
  })
});

export type LanguageProfile = z.output<typeof ProfileSchema>;

export type ProfileLogger = {
  warn: (msg: string) => void;
};

const consoleLogger: ProfileLogger = {
  warn: (msg) => console.warn(`[lang] ${msg}`)
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

function loadProfile(raw: unknown): LanguageProfile {
  return deepFreeze(ProfileSchema.parse(raw));
}

const ENGLISH = loadProfile(en);

const PROFILES: ReadonlyMap<string, LanguageProfile> = new Map(
  [ENGLISH, ...[nl, de, fr].map(loadProfile)].map((p): [string, LanguageProfile] => [p.code, p])
);

export function supportedLanguages(): string[] {
  return [...PROFILES.keys()];
}

/**
 * Looks up the vocabulary for a language code. Locale codes ("nl-BE", "de_AT")
 * resolve to their base language; anything else falls back to English.
 */
export function getProfile(code: string, logger: ProfileLogger = consoleLogger): LanguageProfile {
  const normalized = code.trim().toLowerCase().replace(/_/g, "-");

  const exact = PROFILES.get(normalized);
  if (exact) return exact;

  const base = PROFILES.get(normalized.split("-")[0]);
  if (base) return base;

  logger.warn(`Unsupported language "${code}", falling back to ${ENGLISH.code}`);
  return ENGLISH;
}

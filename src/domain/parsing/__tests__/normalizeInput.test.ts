import { describe, expect, test } from "vitest";
import { getProfile } from "../../language/languageProfiles";
import { normalizeAndSplit, normalizeTimeFragment } from "../normalizeInput";

const en = getProfile("en");
const nl = getProfile("nl");
const fr = getProfile("fr");

describe("normalizeAndSplit", () => {
  test("splits on the language's 'at' word", () => {
    expect(normalizeAndSplit("  Overmorgen  OM 9 ", nl)).toEqual({
      dateFragment: "overmorgen",
      timeFragment: "9"
    });
    expect(normalizeAndSplit("5 January at 14:30", en)).toEqual({
      dateFragment: "5 january",
      timeFragment: "14:30"
    });
  });

  test("without an 'at' word everything is the date fragment", () => {
    const split = normalizeAndSplit("in 2 days", en);
    expect(split.dateFragment).toBe("in 2 days");
    expect(split.timeFragment).toBeUndefined();
  });

  test("strips prepositions and noise as whole words only", () => {
    expect(normalizeAndSplit("the day after tomorrow", en).dateFragment).toBe("day after tomorrow");
    expect(normalizeAndSplit("theatre", en).dateFragment).toBe("theatre");
    expect(normalizeAndSplit("wake me up tomorrow at 7", en)).toEqual({
      dateFragment: "tomorrow",
      timeFragment: "7"
    });
  });

  test("strips a leading 'on' word", () => {
    expect(normalizeAndSplit("on monday", en).dateFragment).toBe("monday");
    expect(normalizeAndSplit("op maandag om 7", nl)).toEqual({
      dateFragment: "maandag",
      timeFragment: "7"
    });
    expect(normalizeAndSplit("le 5 janvier à 7h", fr)).toEqual({
      dateFragment: "5 janvier",
      timeFragment: "7h"
    });
  });

  test("splits off a trailing clock time", () => {
    expect(normalizeAndSplit("tomorrow 7am", en)).toEqual({
      dateFragment: "tomorrow",
      timeFragment: "7am"
    });
    expect(normalizeAndSplit("monday 14:30", en)).toEqual({
      dateFragment: "monday",
      timeFragment: "14:30"
    });
    expect(normalizeAndSplit("january 5", en).dateFragment).toBe("january 5");
  });

  test("a leading 'at' leaves an empty date fragment", () => {
    expect(normalizeAndSplit("at 7", en)).toEqual({ dateFragment: "", timeFragment: "7" });
  });

  test("normalizing a normalized date fragment is a no-op", () => {
    for (const input of ["The day after TOMORROW", "on Monday at 7", "5 January at 14:30", "in 2 days"]) {
      const once = normalizeAndSplit(input, en).dateFragment;
      expect(normalizeAndSplit(once, en).dateFragment).toBe(once);
    }
  });
});

describe("normalizeTimeFragment", () => {
  test("turns meridiem and period words into am/pm markers", () => {
    expect(normalizeTimeFragment("7 PM", en)).toBe("7 pm");
    expect(normalizeTimeFragment("7 in the morning", en)).toBe("7 am");
    expect(normalizeTimeFragment("9 uur 's avonds", nl)).toBe("9 pm");
  });

  test("maps noon and midnight to clock times", () => {
    expect(normalizeTimeFragment("noon", en)).toBe("12:00");
    expect(normalizeTimeFragment("at midnight", en)).toBe("0:00");
  });

  test("cleans tokens that carry digits", () => {
    expect(normalizeTimeFragment("14.30h", en)).toBe("14:30");
    expect(normalizeTimeFragment("21h30", fr)).toBe("2130");
    expect(normalizeTimeFragment("9 o'clock", en)).toBe("9");
  });

  test("leaves words without digits alone", () => {
    expect(normalizeTimeFragment("in 2 days", en)).toBe("in 2 days");
  });

  test("is idempotent", () => {
    for (const [input, profile] of [
      ["7 PM", en],
      ["9 uur 's avonds", nl],
      ["14.30h", en]
    ] as const) {
      const once = normalizeTimeFragment(input, profile);
      expect(normalizeTimeFragment(once, profile)).toBe(once);
    }
  });
});

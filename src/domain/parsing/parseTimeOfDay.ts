import { InvalidTimeFormatError } from "./errors";

export type TimeOfDay = {
  hour: number;
  minute: number;
  second: number;
};

type Meridiem = "a" | "p";

type TimeMatch = {
  hour: number;
  minute: number;
  second?: number;
  meridiem?: Meridiem;
};

type TimePattern = {
  re: RegExp;
  read: (m: RegExpExecArray) => TimeMatch;
};

function meridiemOf(s: string): Meridiem {
  return s === "p" ? "p" : "a";
}

// First match wins. Fragments are expected to have gone through normalizeTimeFragment.
const PATTERNS: TimePattern[] = [
  // "7", "19"
  { re: /^(\d{1,2})$/, read: (m) => ({ hour: Number(m[1]), minute: 0 }) },
  // "7:30", "19:05"
  { re: /^(\d{1,2}):(\d{2})$/, read: (m) => ({ hour: Number(m[1]), minute: Number(m[2]) }) },
  // "730", "0930": minutes are the last two digits
  { re: /^(\d{1,2})(\d{2})$/, read: (m) => ({ hour: Number(m[1]), minute: Number(m[2]) }) },
  // "7pm", "7 a", "12am"
  {
    re: /^(\d{1,2}) ?([ap])m?$/,
    read: (m) => ({ hour: Number(m[1]), minute: 0, meridiem: meridiemOf(m[2]) })
  },
  // "7:30pm", "11:15 a"
  {
    re: /^(\d{1,2}):(\d{2}) ?([ap])m?$/,
    read: (m) => ({ hour: Number(m[1]), minute: Number(m[2]), meridiem: meridiemOf(m[3]) })
  },
  // "07:00:30"
  {
    re: /^(\d{1,2}):(\d{2}):(\d{2})$/,
    read: (m) => ({ hour: Number(m[1]), minute: Number(m[2]), second: Number(m[3]) })
  }
];

function to24h(hour: number, meridiem: Meridiem): number {
  return (hour % 12) + (meridiem === "p" ? 12 : 0);
}

function matchTime(fragment: string): TimeMatch | null {
  for (const { re, read } of PATTERNS) {
    const m = re.exec(fragment);
    if (m) return read(m);
  }
  return null;
}

export function parseTimeOfDay(fragment: string): TimeOfDay {
  const text = fragment.trim();
  const matched = matchTime(text);
  if (!matched) throw new InvalidTimeFormatError(fragment);

  if (matched.meridiem && matched.hour > 12) throw new InvalidTimeFormatError(fragment);

  const hour = matched.meridiem ? to24h(matched.hour, matched.meridiem) : matched.hour;
  const minute = matched.minute;
  const second = matched.second ?? 0;

  if (hour > 23 || minute > 59 || second > 59) throw new InvalidTimeFormatError(fragment);

  return { hour, minute, second };
}

export function formatTimeOfDay(t: TimeOfDay): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

import { ParseError } from './errors.js';

interface AbsoluteFormat {
  pattern: RegExp;
  build(match: RegExpExecArray, now: Date): Date | null;
}

function localDate(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hours, minutes, seconds, 0);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

const num = (match: RegExpExecArray, group: number) => Number(match[group]);

// Tried in order; the first format that covers the whole input wins.
const ABSOLUTE_FORMATS: readonly AbsoluteFormat[] = [
  {
    pattern: /^(\d{1,2}):(\d{2})$/,
    build: (match, now) =>
      localDate(now.getFullYear(), now.getMonth() + 1, now.getDate(), num(match, 1), num(match, 2), 0),
  },
  {
    pattern: /^(\d{1,2}):(\d{2}):(\d{2})$/,
    build: (match, now) =>
      localDate(
        now.getFullYear(),
        now.getMonth() + 1,
        now.getDate(),
        num(match, 1),
        num(match, 2),
        num(match, 3),
      ),
  },
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    build: (match) => localDate(num(match, 1), num(match, 2), num(match, 3), 0, 0, 0),
  },
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2})$/,
    build: (match) =>
      localDate(
        num(match, 1),
        num(match, 2),
        num(match, 3),
        num(match, 4),
        num(match, 5),
        num(match, 6),
      ),
  },
];

type RelativeUnit = 'days' | 'hours' | 'minutes' | 'seconds';

const RELATIVE_UNITS = new Map<string, RelativeUnit>([
  ['d', 'days'],
  ['day', 'days'],
  ['days', 'days'],
  ['h', 'hours'],
  ['hour', 'hours'],
  ['hours', 'hours'],
  ['m', 'minutes'],
  ['minute', 'minutes'],
  ['minutes', 'minutes'],
  ['s', 'seconds'],
  ['second', 'seconds'],
  ['seconds', 'seconds'],
]);

const UNIT_ORDER: readonly RelativeUnit[] = ['days', 'hours', 'minutes', 'seconds'];

const UNIT_SECONDS: Record<RelativeUnit, number> = {
  days: 86_400,
  hours: 3_600,
  minutes: 60,
  seconds: 1,
};

function parseRelative(text: string, now: Date): Date | null {
  const token = /\s*([+-]?\d+)\s*([A-Za-z]+)\s*/y;
  const amounts: Record<RelativeUnit, number> = { days: 0, hours: 0, minutes: 0, seconds: 0 };
  let matched = false;

  while (token.lastIndex < text.length) {
    const match = token.exec(text);
    if (!match) {
      return null;
    }
    const unit = RELATIVE_UNITS.get(match[2] ?? '');
    if (!unit) {
      return null;
    }
    amounts[unit] = Number(match[1]);
    matched = true;
  }

  if (!matched) {
    return null;
  }

  const offsetSeconds = UNIT_ORDER.reduce(
    (total, unit) => total + amounts[unit] * UNIT_SECONDS[unit],
    0,
  );
  return new Date(now.getTime() - offsetSeconds * 1000);
}

/**
 * Parses `--since`/`--until` values: `HH:MM`, `HH:MM:SS`, `YYYY-MM-DD`,
 * `YYYY-MM-DD HH:MM:SS` in local time, or a relative offset such as
 * `2 days`, `1h 30m` counted back from now.
 */
export function parseTime(text: string, now: Date = new Date()): Date {
  const input = text.trim();

  for (const format of ABSOLUTE_FORMATS) {
    const match = format.pattern.exec(input);
    if (match) {
      const date = format.build(match, now);
      if (date) {
        return date;
      }
    }
  }

  const relative = input.length > 0 ? parseRelative(input, now) : null;
  if (relative) {
    return relative;
  }

  throw new ParseError(`Failed to parse time '${text}'`, { input: text });
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

// Composite directives expand before parsing.
const EXPANSIONS: Record<string, string> = {
  T: '%H:%M:%S',
  D: '%m/%d/%y',
  F: '%Y-%m-%d',
};

export interface TimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

interface ParseState {
  input: string;
  pos: number;
  year?: number;
  month?: number;
  day?: number;
  dayOfYear?: number;
  hour?: number;
  hour12?: number;
  pm?: boolean;
  minute?: number;
  second?: number;
}

function expandFormat(format: string): string {
  return format.replace(/%(.)/g, (directive, d: string) => EXPANSIONS[d] ?? directive);
}

function readNumber(state: ParseState, maxDigits: number, min: number, max: number): number | undefined {
  const match = new RegExp(`^\\d{1,${maxDigits}}`).exec(state.input.slice(state.pos));
  if (!match) return undefined;
  const value = Number(match[0]);
  if (value < min || value > max) return undefined;
  state.pos += match[0].length;
  return value;
}

function skipWhitespace(state: ParseState): void {
  while (state.pos < state.input.length && /\s/.test(state.input.charAt(state.pos))) {
    state.pos++;
  }
}

function readMonthName(state: ParseState): number | undefined {
  const rest = state.input.slice(state.pos).toLowerCase();
  for (const [index, name] of MONTH_NAMES.entries()) {
    if (rest.startsWith(name)) {
      state.pos += name.length;
      return index + 1;
    }
    if (rest.startsWith(name.slice(0, 3))) {
      state.pos += 3;
      return index + 1;
    }
  }
  return undefined;
}

function readMeridiem(state: ParseState): boolean | undefined {
  const rest = state.input.slice(state.pos, state.pos + 2).toUpperCase();
  if (rest !== 'AM' && rest !== 'PM') return undefined;
  state.pos += 2;
  return rest === 'PM';
}

/** Returns false when the directive did not match at the current position. */
function applyDirective(state: ParseState, directive: string): boolean {
  switch (directive) {
    case 'Y':
      return (state.year = readNumber(state, 4, 0, 9999)) !== undefined;
    case 'y': {
      const yy = readNumber(state, 2, 0, 99);
      if (yy === undefined) return false;
      state.year = yy < 69 ? 2000 + yy : 1900 + yy;
      return true;
    }
    case 'm':
      return (state.month = readNumber(state, 2, 1, 12)) !== undefined;
    case 'b':
    case 'B':
    case 'h':
      return (state.month = readMonthName(state)) !== undefined;
    case 'e':
      skipWhitespace(state);
      return (state.day = readNumber(state, 2, 1, 31)) !== undefined;
    case 'd':
      return (state.day = readNumber(state, 2, 1, 31)) !== undefined;
    case 'j':
      return (state.dayOfYear = readNumber(state, 3, 1, 366)) !== undefined;
    case 'H':
      return (state.hour = readNumber(state, 2, 0, 23)) !== undefined;
    case 'I':
      return (state.hour12 = readNumber(state, 2, 1, 12)) !== undefined;
    case 'p':
      return (state.pm = readMeridiem(state)) !== undefined;
    case 'M':
      return (state.minute = readNumber(state, 2, 0, 59)) !== undefined;
    case 'S':
      return (state.second = readNumber(state, 2, 0, 60)) !== undefined;
    case '%':
      if (state.input[state.pos] !== '%') return false;
      state.pos++;
      return true;
    default:
      return false;
  }
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;
}

function resolveFields(state: ParseState): TimeFields | undefined {
  const year = state.year ?? 1900;
  let month = state.month ?? 1;
  let day = state.day ?? 1;

  if (state.dayOfYear !== undefined && state.month === undefined && state.day === undefined) {
    let remaining = state.dayOfYear;
    month = 1;
    while (month <= 12 && remaining > daysInMonth(year, month)) {
      remaining -= daysInMonth(year, month);
      month++;
    }
    if (month > 12) return undefined;
    day = remaining;
  }

  if (day > daysInMonth(year, month)) return undefined;

  let hour = state.hour ?? 0;
  if (state.hour12 !== undefined) {
    hour = (state.hour12 % 12) + (state.pm ? 12 : 0);
  } else if (state.pm && state.hour !== undefined && state.hour < 12) {
    hour = state.hour + 12;
  }

  return { year, month, day, hour, minute: state.minute ?? 0, second: state.second ?? 0 };
}

/**
 * Parse `input` against a strftime-style `format`. Whitespace in the format
 * matches any run of whitespace (including none); other characters must match
 * literally. Fields the format leaves out default to 1900-01-01 00:00:00.
 * Returns undefined when the input does not match.
 */
export function parseTime(input: string, format: string): TimeFields | undefined {
  const pattern = expandFormat(format);
  const state: ParseState = { input, pos: 0 };

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);

    if (ch === '%') {
      const directive = pattern.charAt(i + 1);
      i++;
      if (!applyDirective(state, directive)) return undefined;
    } else if (/\s/.test(ch)) {
      skipWhitespace(state);
    } else {
      if (input.charAt(state.pos) !== ch) return undefined;
      state.pos++;
    }
  }

  if (input.slice(state.pos).trim() !== '') return undefined;
  return resolveFields(state);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(fields: TimeFields): string {
  return (
    `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)} ` +
    `${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`
  );
}

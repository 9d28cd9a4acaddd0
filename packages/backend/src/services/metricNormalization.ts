import type { MetricBounds, MetricKind, NormalizedValue } from "@finscope/shared";

export type NormalizationOutcome =
  | { ok: true; value: NormalizedValue }
  | { ok: false; reason: string };

const CURRENCY_SYMBOLS: ReadonlyArray<[string, string]> = [
  ["US$", "USD"],
  ["C$", "CAD"],
  ["A$", "AUD"],
  ["HK$", "HKD"],
  ["$", "USD"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["¥", "JPY"],
  ["₹", "INR"]
];

const CURRENCY_CODES = ["USD", "EUR", "GBP", "JPY", "CHF", "CAD", "AUD", "CNY", "INR", "HKD", "SGD", "SEK", "NOK", "DKK"];

const CURRENCY_WORDS: Record<string, string> = {
  dollar: "USD",
  dollars: "USD",
  euro: "EUR",
  euros: "EUR",
  pound: "GBP",
  pounds: "GBP",
  yen: "JPY"
};

const SCALE_WORDS: Record<string, number> = {
  k: 1e3,
  thousand: 1e3,
  thousands: 1e3,
  m: 1e6,
  mm: 1e6,
  mn: 1e6,
  mio: 1e6,
  million: 1e6,
  millions: 1e6,
  b: 1e9,
  bn: 1e9,
  billion: 1e9,
  billions: 1e9,
  t: 1e12,
  tn: 1e12,
  trillion: 1e12,
  trillions: 1e12
};

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12
};

const NUMBER_PATTERN = /\d[\d,]*(?:\.\d+)?|\.\d+/;
const PERCENT_PATTERN = /%|\bper\s?cent\b|\bpct\b/i;
const BPS_PATTERN = /\bbps\b|\bbasis\s+points?\b/i;

export function normalizeMetricValue(
  kind: MetricKind,
  rawValue: string,
  unit: string | null,
  expectedUnit?: string
): NormalizationOutcome {
  const raw = rawValue.trim();
  if (raw.length === 0) {
    return { ok: false, reason: "empty value" };
  }

  switch (kind) {
    case "currency":
      return normalizeCurrency(raw, unit, expectedUnit);
    case "percentage":
      return normalizePercentage(raw, unit);
    case "count":
      return normalizeCount(raw, unit);
    case "date":
      return normalizeDate(raw);
    default:
      return { ok: false, reason: `unsupported metric kind: ${String(kind)}` };
  }
}

export function checkBounds(kind: MetricKind, value: NormalizedValue, bounds: MetricBounds = {}): string | null {
  if (value.type !== "number") {
    return null;
  }

  const min = bounds.min ?? (kind === "count" ? 0 : undefined);
  if (min !== undefined && value.value < min) {
    return `${value.value} is below the minimum ${min}`;
  }
  if (bounds.max !== undefined && value.value > bounds.max) {
    return `${value.value} is above the maximum ${bounds.max}`;
  }
  return null;
}

const RELATIVE_TOLERANCE = 1e-6;

export function sameNormalizedValue(a: NormalizedValue, b: NormalizedValue): boolean {
  if (a.type === "number" && b.type === "number") {
    if (a.unit !== b.unit) {
      return false;
    }
    const scale = Math.max(Math.abs(a.value), Math.abs(b.value), 1);
    return Math.abs(a.value - b.value) <= RELATIVE_TOLERANCE * scale;
  }
  if (a.type === "date" && b.type === "date") {
    return a.value === b.value;
  }
  if (a.type === "string" && b.type === "string") {
    return a.value === b.value;
  }
  return false;
}

export function formatNormalizedValue(value: NormalizedValue): string {
  if (value.type === "number") {
    return String(value.value);
  }
  return value.value;
}

function normalizeCurrency(raw: string, unit: string | null, expectedUnit?: string): NormalizationOutcome {
  const combined = `${raw} ${unit ?? ""}`;
  if (PERCENT_PATTERN.test(combined) || BPS_PATTERN.test(combined)) {
    return { ok: false, reason: "currency value is expressed as a percentage" };
  }

  const amount = parseScaledNumber(raw, unit);
  if (amount === null) {
    return { ok: false, reason: `no numeric amount in "${raw}"` };
  }

  const detected = detectCurrency(combined);
  const expected = expectedUnit?.trim().toUpperCase();
  if (detected && expected && detected !== expected) {
    return { ok: false, reason: `expected ${expected} but found ${detected}` };
  }

  return { ok: true, value: { type: "number", value: amount, unit: detected ?? expected ?? "" } };
}

function normalizePercentage(raw: string, unit: string | null): NormalizationOutcome {
  const combined = `${raw} ${unit ?? ""}`;
  const isBps = BPS_PATTERN.test(combined);
  if (!isBps && !PERCENT_PATTERN.test(combined)) {
    return { ok: false, reason: `"${raw}" is not a percentage` };
  }
  if (detectCurrency(raw)) {
    return { ok: false, reason: `"${raw}" is a currency amount` };
  }

  const value = parseSignedNumber(raw);
  if (value === null) {
    return { ok: false, reason: `no numeric value in "${raw}"` };
  }

  return { ok: true, value: { type: "number", value: isBps ? round(value / 100) : value, unit: "%" } };
}

function normalizeCount(raw: string, unit: string | null): NormalizationOutcome {
  const combined = `${raw} ${unit ?? ""}`;
  if (PERCENT_PATTERN.test(combined) || BPS_PATTERN.test(combined)) {
    return { ok: false, reason: "count is expressed as a percentage" };
  }
  if (detectCurrency(combined)) {
    return { ok: false, reason: "count is expressed as a currency amount" };
  }

  const value = parseScaledNumber(raw, null);
  if (value === null) {
    return { ok: false, reason: `no numeric value in "${raw}"` };
  }
  if (!Number.isInteger(value)) {
    return { ok: false, reason: `${value} is not a whole number` };
  }

  return { ok: true, value: { type: "number", value, unit: "" } };
}

function normalizeDate(raw: string): NormalizationOutcome {
  const text = raw.trim().replace(/\s+/g, " ").replace(/(\d)(st|nd|rd|th)\b/gi, "$1");

  let match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text) ?? /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/.exec(text);
  if (match) {
    return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]), raw);
  }

  match = /^(\d{4})-(\d{1,2})$/.exec(text);
  if (match) {
    return toIsoMonth(Number(match[1]), Number(match[2]), raw);
  }

  // Numeric day/month ordering follows the US convention: MM/DD/YYYY.
  match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (match) {
    return toIsoDate(Number(match[3]), Number(match[1]), Number(match[2]), raw);
  }

  match = /^([A-Za-z]+)\.? (\d{1,2}),? (\d{4})$/.exec(text);
  if (match) {
    return toIsoDate(Number(match[3]), monthNumber(match[1]), Number(match[2]), raw);
  }

  match = /^(\d{1,2}) ([A-Za-z]+)\.?,? (\d{4})$/.exec(text);
  if (match) {
    return toIsoDate(Number(match[3]), monthNumber(match[2]), Number(match[1]), raw);
  }

  match = /^([A-Za-z]+)\.?,? (\d{4})$/.exec(text);
  if (match) {
    return toIsoMonth(Number(match[2]), monthNumber(match[1]), raw);
  }

  return { ok: false, reason: `"${raw}" is not a calendar date` };
}

function monthNumber(name: string | undefined): number {
  return MONTHS[(name ?? "").toLowerCase()] ?? 0;
}

function toIsoDate(year: number, month: number, day: number, raw: string): NormalizationOutcome {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return { ok: false, reason: `"${raw}" is not a valid calendar date` };
  }
  return { ok: true, value: { type: "date", value: `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` } };
}

function toIsoMonth(year: number, month: number, raw: string): NormalizationOutcome {
  if (month < 1 || month > 12) {
    return { ok: false, reason: `"${raw}" is not a valid calendar month` };
  }
  return { ok: true, value: { type: "date", value: `${pad(year, 4)}-${pad(month, 2)}` } };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function detectCurrency(text: string): string | null {
  const upper = text.toUpperCase();
  for (const code of CURRENCY_CODES) {
    if (new RegExp(`\\b${code}\\b`).test(upper)) {
      return code;
    }
  }
  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (text.includes(symbol)) {
      return code;
    }
  }
  for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    const code = CURRENCY_WORDS[word];
    if (code) {
      return code;
    }
  }
  return null;
}

function parseSignedNumber(raw: string): number | null {
  const match = NUMBER_PATTERN.exec(raw);
  if (!match) {
    return null;
  }

  const value = Number(match[0].replace(/,/g, ""));
  if (!Number.isFinite(value)) {
    return null;
  }

  const before = raw.slice(0, match.index);
  const after = raw.slice(match.index + match[0].length);
  // Accounting notation: (1,234) is negative, as is a leading minus before any symbol.
  const parenthesized = before.includes("(") && after.includes(")");
  const minus = /[-−–]\s*[^\d\s]{0,4}\s*$/.test(before);
  const negative = parenthesized || minus;
  return negative ? -value : value;
}

function parseScaledNumber(raw: string, unit: string | null): number | null {
  const value = parseSignedNumber(raw);
  if (value === null) {
    return null;
  }

  const match = NUMBER_PATTERN.exec(raw);
  const after = match ? raw.slice(match.index + match[0].length) : "";
  const scale = findScale(after) ?? (unit ? findScale(unit) : null) ?? 1;
  return round(value * scale);
}

function findScale(text: string): number | null {
  const immediate = /^\s*([A-Za-z]+)/.exec(text)?.[1]?.toLowerCase();
  if (immediate !== undefined) {
    const scale = SCALE_WORDS[immediate];
    if (scale !== undefined) {
      return scale;
    }
  }

  const word = /\b(thousands?|millions?|billions?|trillions?|mn|bn|tn|mm)\b/i.exec(text)?.[1]?.toLowerCase();
  return word === undefined ? null : (SCALE_WORDS[word] ?? null);
}

function round(value: number): number {
  return Number.parseFloat(value.toPrecision(15));
}

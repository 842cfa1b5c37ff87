// backend/services/endpoints/src/lib/duration.ts

/**
 * Duration codec for check frequencies.
 *
 * A Duration is a signed count of nanoseconds limited to the int64 range.
 * Text form: `[-+]?([0-9]*(\.[0-9]*)?[a-z]+)+` with units ns, us, µs, μs, ms,
 * s, m, h (or the bare "0"), e.g. "30s", "1m30s", "1.5ms", "2h45m".
 * formatDuration() emits the canonical form: "0s", a single sub-second unit
 * below one second, else `[<h>h][<m>m]<s>[.<frac>]s` ("1h0m0s").
 */

export type Duration = bigint;

export const NANOSECOND: Duration = 1n;
export const MICROSECOND: Duration = 1_000n * NANOSECOND;
export const MILLISECOND: Duration = 1_000n * MICROSECOND;
export const SECOND: Duration = 1_000n * MILLISECOND;
export const MINUTE: Duration = 60n * SECOND;
export const HOUR: Duration = 60n * MINUTE;

const LIMIT = 1n << 63n;
const MAX_DURATION = LIMIT - 1n;

const UNITS: ReadonlyMap<string, Duration> = new Map([
  ["ns", NANOSECOND],
  ["us", MICROSECOND],
  ["µs", MICROSECOND], // micro sign
  ["μs", MICROSECOND], // greek mu
  ["ms", MILLISECOND],
  ["s", SECOND],
  ["m", MINUTE],
  ["h", HOUR],
]);

export class DurationParseError extends Error {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`${reason} duration "${input}"`);
    this.name = "DurationParseError";
    this.input = input;
  }
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function takeDigits(s: string): [digits: string, rest: string] {
  let i = 0;
  while (i < s.length && isDigit(s[i])) i++;
  return [s.slice(0, i), s.slice(i)];
}

export function parseDuration(input: string): Duration {
  let s = input;
  let neg = false;

  if (s[0] === "-" || s[0] === "+") {
    neg = s[0] === "-";
    s = s.slice(1);
  }
  if (s === "0") return 0n;
  if (s === "") throw new DurationParseError(input, "invalid");

  let total = 0n;
  while (s !== "") {
    if (!(s[0] === "." || isDigit(s[0]))) {
      throw new DurationParseError(input, "invalid");
    }

    const [whole, afterWhole] = takeDigits(s);
    s = afterWhole;
    let frac = "";
    if (s[0] === ".") {
      [frac, s] = takeDigits(s.slice(1));
    }
    if (whole === "" && frac === "") {
      throw new DurationParseError(input, "invalid");
    }

    let i = 0;
    while (i < s.length && s[i] !== "." && !isDigit(s[i])) i++;
    if (i === 0) throw new DurationParseError(input, "missing unit in");
    const unitName = s.slice(0, i);
    s = s.slice(i);

    const unit = UNITS.get(unitName);
    if (unit === undefined) {
      throw new DurationParseError(input, `unknown unit "${unitName}" in`);
    }

    const v = whole === "" ? 0n : BigInt(whole);
    if (v > LIMIT / unit) throw new DurationParseError(input, "invalid");
    let part = v * unit;
    if (frac !== "") {
      part += (BigInt(frac) * unit) / 10n ** BigInt(frac.length);
    }
    total += part;
    if (total > LIMIT) throw new DurationParseError(input, "invalid");
  }

  if (neg) return -total;
  if (total > MAX_DURATION) throw new DurationParseError(input, "invalid");
  return total;
}

// Fraction of v / 10^prec without trailing zeros (and without the dot when
// the fraction is zero), plus the integer part.
function fmtFrac(v: bigint, prec: number): [frac: string, whole: bigint] {
  let digits = "";
  let print = false;
  let rest = v;
  for (let i = 0; i < prec; i++) {
    const digit = rest % 10n;
    print = print || digit !== 0n;
    if (print) digits = digit.toString() + digits;
    rest /= 10n;
  }
  return [print ? `.${digits}` : "", rest];
}

export function formatDuration(d: Duration): string {
  const neg = d < 0n;
  const u = neg ? -d : d;
  let out: string;

  if (u < SECOND) {
    if (u === 0n) return "0s";
    let prec: number;
    let unit: string;
    if (u < MICROSECOND) {
      prec = 0;
      unit = "ns";
    } else if (u < MILLISECOND) {
      prec = 3;
      unit = "µs";
    } else {
      prec = 6;
      unit = "ms";
    }
    const [frac, whole] = fmtFrac(u, prec);
    out = `${whole}${frac}${unit}`;
  } else {
    const [frac, whole] = fmtFrac(u, 9);
    let rest = whole;
    out = `${rest % 60n}${frac}s`;
    rest /= 60n;
    if (rest > 0n) {
      out = `${rest % 60n}m${out}`;
      rest /= 60n;
      if (rest > 0n) out = `${rest}h${out}`;
    }
  }

  return neg ? `-${out}` : out;
}

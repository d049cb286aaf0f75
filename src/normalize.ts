import { formatTimestamp } from "./time.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A number as produced by an aggregation, tagged with how it should be
 * serialized. Rounding is deferred to {@link toJsonNumber}.
 */
export class NumericValue {
  private constructor(
    readonly kind: "integer" | "float" | "absent",
    readonly value: number,
    readonly digits: number
  ) {}

  static integer(value: number | null | undefined): NumericValue {
    return value == null ? NumericValue.absent() : new NumericValue("integer", value, 0);
  }

  static float(value: number | null | undefined, digits: number): NumericValue {
    return value == null ? NumericValue.absent() : new NumericValue("float", value, digits);
  }

  static absent(): NumericValue {
    return new NumericValue("absent", Number.NaN, 0);
  }
}

export type Reportable =
  | JsonPrimitive
  | NumericValue
  | Date
  | readonly Reportable[]
  | { readonly [key: string]: Reportable };

// Digits kept when `value` sits exactly halfway between two results, else null.
// toFixed(100) spells out the exact binary value, so a true tie shows up as a
// 5 followed only by zeros.
function truncatedTie(value: number, digits: number): string | null {
  if (Math.abs(value) >= 1e21) return null;
  const exact = Math.abs(value).toFixed(100);
  const cut = exact.indexOf(".") + (digits > 0 ? 1 + digits : 0);
  const tail = exact.slice(cut).replace(".", "");
  return /^50*$/.test(tail) ? exact.slice(0, cut) : null;
}

/** Round half to even at `digits` places. */
function roundTo(value: number, digits: number): number {
  let rounded = Number(value.toFixed(digits));
  const kept = truncatedTie(value, digits);
  if (kept !== null && Number(kept[kept.length - 1]) % 2 === 0) {
    rounded = Math.sign(value) * Number(kept);
  }
  // collapses -0
  return rounded === 0 ? 0 : rounded;
}

export function toJsonNumber(value: NumericValue): number | null {
  if (value.kind === "absent" || !Number.isFinite(value.value)) return null;
  if (value.kind === "integer") {
    const truncated = Math.trunc(value.value);
    return truncated === 0 ? 0 : truncated;
  }
  return roundTo(value.value, value.digits);
}

/** Convert an aggregation result into plain JSON. Applying it twice is a no-op. */
export function normalize(value: Reportable): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof NumericValue) {
    return toJsonNumber(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatTimestamp(value);
  }
  if (isReportableArray(value)) {
    return value.map((item) => normalize(item));
  }

  const out: { [key: string]: JsonValue } = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = normalize(item);
  }
  return out;
}

function isReportableArray(value: Reportable): value is readonly Reportable[] {
  return Array.isArray(value);
}

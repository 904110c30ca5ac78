import { decodePayload, isJsonObject, type JsonObject } from "../adapters/payloadDecoder";
import type { CanonicalFields, FieldValue, NormalizationWarning } from "../types/models";
import { round } from "../utils/statistics";
import { fieldCatalog, type FieldCatalog } from "./fieldCatalog";

export interface NormalizedQuote {
  fields: CanonicalFields;
  warnings: NormalizationWarning[];
  /** Canonical fields present in the output, derived ones included. */
  canonicalFields: string[];
}

type ParsedValue =
  | { kind: "ok"; value: FieldValue }
  | { kind: "missing" }
  | { kind: "malformed"; reason: string };

const MISSING_MARKERS = new Set(["", "-", "--", "na", "n/a", "null", "none"]);

export const toSnakeCase = (key: string): string =>
  key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s-]+/g, "_")
    .toLowerCase();

/** Flattens nested objects and arrays into dotted snake_case paths (`ohlc.open`, `depth.buy.0.price`). */
export const flattenPayload = (body: JsonObject, prefix = "", out = new Map<string, unknown>()): Map<string, unknown> => {
  for (const [rawKey, value] of Object.entries(body)) {
    const key = prefix ? `${prefix}.${toSnakeCase(rawKey)}` : toSnakeCase(rawKey);
    if (isJsonObject(value)) {
      flattenPayload(value, key, out);
    } else if (Array.isArray(value)) {
      value.forEach((item, index) => {
        if (isJsonObject(item)) flattenPayload(item, `${key}.${index}`, out);
        else out.set(`${key}.${index}`, item);
      });
    } else if (!out.has(key)) {
      out.set(key, value);
    }
  }
  return out;
};

const parseNumeric = (value: unknown): ParsedValue => {
  if (value === null || value === undefined) return { kind: "missing" };
  if (typeof value === "number") {
    return Number.isFinite(value) ? { kind: "ok", value } : { kind: "malformed", reason: "non-finite number" };
  }
  if (typeof value === "boolean") return { kind: "ok", value: value ? 1 : 0 };
  if (typeof value !== "string") return { kind: "malformed", reason: `unexpected ${typeof value}` };

  const trimmed = value.trim();
  if (MISSING_MARKERS.has(trimmed.toLowerCase())) return { kind: "missing" };

  const cleaned = trimmed.replace(/[,\s₹%]/g, "").replace(/^rs\.?/i, "");
  const parsed = Number(cleaned);
  if (cleaned.length === 0 || !Number.isFinite(parsed)) {
    return { kind: "malformed", reason: "not a numeric string" };
  }
  return { kind: "ok", value: parsed };
};

const parseText = (value: unknown): ParsedValue => {
  if (value === null || value === undefined) return { kind: "missing" };
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? { kind: "ok", value: trimmed } : { kind: "missing" };
  }
  if (typeof value === "number" || typeof value === "boolean") return { kind: "ok", value: String(value) };
  return { kind: "malformed", reason: `unexpected ${typeof value}` };
};

const numberOf = (fields: CanonicalFields, key: string): number | null => {
  const value = fields[key];
  return typeof value === "number" ? value : null;
};

type Derivation = [field: string, compute: (fields: CanonicalFields) => number | null];

const DERIVATIONS: Derivation[] = [
  [
    "price_change",
    (f) => {
      const price = numberOf(f, "current_price");
      const prev = numberOf(f, "prev_close");
      return price !== null && prev !== null ? price - prev : null;
    }
  ],
  [
    "price_change_percent",
    (f) => {
      const price = numberOf(f, "current_price");
      const prev = numberOf(f, "prev_close");
      return price !== null && prev !== null && prev !== 0 ? ((price - prev) / prev) * 100 : null;
    }
  ],
  [
    "turnover",
    (f) => {
      const volume = numberOf(f, "volume");
      const price = numberOf(f, "vwap") ?? numberOf(f, "current_price");
      return volume !== null && price !== null ? volume * price : null;
    }
  ],
  [
    "delivery_percentage",
    (f) => {
      const delivered = numberOf(f, "delivery_quantity");
      const volume = numberOf(f, "volume");
      return delivered !== null && volume !== null && volume > 0 ? (delivered / volume) * 100 : null;
    }
  ],
  [
    "day_range_percent",
    (f) => {
      const high = numberOf(f, "high");
      const low = numberOf(f, "low");
      return high !== null && low !== null && low > 0 ? ((high - low) / low) * 100 : null;
    }
  ],
  [
    "distance_from_52w_high",
    (f) => {
      const price = numberOf(f, "current_price");
      const high = numberOf(f, "week_52_high");
      return price !== null && high !== null && high > 0 ? ((price - high) / high) * 100 : null;
    }
  ],
  [
    "distance_from_52w_low",
    (f) => {
      const price = numberOf(f, "current_price");
      const low = numberOf(f, "week_52_low");
      return price !== null && low !== null && low > 0 ? ((price - low) / low) * 100 : null;
    }
  ]
];

export class Normalizer {
  constructor(private readonly catalog: FieldCatalog = fieldCatalog) {}

  /**
   * Maps a decoded quote body onto canonical fields. Absent values are
   * omitted; malformed ones are dropped and reported as warnings.
   */
  transform(body: JsonObject, options: { symbol?: string } = {}): NormalizedQuote {
    const flat = flattenPayload(body);
    const fields: CanonicalFields = {};
    const warnings: NormalizationWarning[] = [];

    for (const field of this.catalog.fields) {
      const candidates = [field, ...(this.catalog.aliases[field]?.upstream ?? [])];
      const isText = this.catalog.textFields.has(field);

      for (const sourceKey of candidates) {
        if (!flat.has(sourceKey)) continue;
        const raw = flat.get(sourceKey);
        const parsed = isText ? parseText(raw) : parseNumeric(raw);
        if (parsed.kind === "ok") {
          fields[field] = parsed.value;
          break;
        }
        if (parsed.kind === "malformed") {
          warnings.push({ field, sourceKey, value: raw, reason: parsed.reason });
        }
      }
    }

    if (options.symbol && fields.symbol === undefined) {
      fields.symbol = options.symbol.toUpperCase();
    }

    for (const [field, compute] of DERIVATIONS) {
      if (fields[field] !== undefined) continue;
      const value = compute(fields);
      if (value !== null && Number.isFinite(value)) fields[field] = round(value, 4);
    }

    const canonicalFields = Object.keys(fields);
    for (const field of canonicalFields) {
      for (const alias of this.catalog.aliases[field]?.emit ?? []) {
        fields[alias] = fields[field];
      }
    }

    return { fields, warnings, canonicalFields };
  }

  /** Decodes a raw response body of any known shape, then transforms it. */
  normalizeRaw(raw: unknown, symbol?: string): NormalizedQuote {
    const decoded = decodePayload(raw, symbol);
    return this.transform(decoded.body, { symbol });
  }
}

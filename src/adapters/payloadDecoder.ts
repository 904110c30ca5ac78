import { NormalizationError } from "../core/errors";

export type JsonObject = Record<string, unknown>;

/** The three response layouts the quote endpoints are known to produce. */
export type DecodedPayload =
  | { shape: "envelope"; status: string; body: JsonObject }
  | { shape: "flat"; body: JsonObject }
  | { shape: "keyed"; key: string; body: JsonObject };

export type PayloadShape = DecodedPayload["shape"];

export class EnvelopeFailureError extends Error {
  constructor(
    readonly status: string,
    message: string
  ) {
    super(message);
    this.name = "EnvelopeFailureError";
  }
}

const QUOTE_MARKER_KEYS = new Set([
  "last_price",
  "lastprice",
  "ltp",
  "current_price",
  "last_traded_price",
  "close",
  "ohlc"
]);

const SUCCESS_STATUSES = new Set(["SUCCESS", "OK"]);

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isQuoteMarker = (key: string): boolean => {
  const lower = key.toLowerCase();
  return QUOTE_MARKER_KEYS.has(lower) || QUOTE_MARKER_KEYS.has(lower.replace(/_/g, ""));
};

const looksLikeQuote = (value: unknown): value is JsonObject =>
  isJsonObject(value) && Object.keys(value).some(isQuoteMarker);

const decodeEnvelope = (raw: JsonObject): DecodedPayload | null => {
  if (typeof raw.status !== "string" || !("payload" in raw)) return null;

  const status = raw.status.toUpperCase();
  if (!SUCCESS_STATUSES.has(status)) {
    const detail = isJsonObject(raw.error) && typeof raw.error.message === "string"
      ? raw.error.message
      : `status ${raw.status}`;
    throw new EnvelopeFailureError(status, `Upstream envelope reported failure: ${detail}`);
  }
  if (!isJsonObject(raw.payload)) {
    throw new NormalizationError("Envelope payload is not an object", raw.payload);
  }
  return { shape: "envelope", status, body: raw.payload };
};

const decodeFlat = (raw: JsonObject): DecodedPayload | null =>
  looksLikeQuote(raw) ? { shape: "flat", body: raw } : null;

/** Quote-like objects one or two levels below the container, e.g. `NSE_EQ.2885`. */
const collectQuotes = (container: JsonObject): Array<[string, JsonObject]> => {
  const found: Array<[string, JsonObject]> = [];
  for (const [key, value] of Object.entries(container)) {
    if (!isJsonObject(value)) continue;
    if (looksLikeQuote(value)) {
      found.push([key, value]);
      continue;
    }
    for (const [innerKey, inner] of Object.entries(value)) {
      if (looksLikeQuote(inner)) found.push([`${key}.${innerKey}`, inner]);
    }
  }
  return found;
};

const decodeKeyed = (raw: JsonObject, symbol?: string): DecodedPayload | null => {
  const container = isJsonObject(raw.data) ? raw.data : raw;
  const prefix = container === raw ? "" : "data.";

  if (container !== raw && looksLikeQuote(container)) {
    return { shape: "keyed", key: "data", body: container };
  }

  const entries = collectQuotes(container);
  const wanted = symbol?.toUpperCase();
  const matchesSymbol = (path: string): boolean => {
    const leaf = (path.split(".").pop() ?? "").toUpperCase();
    return leaf === wanted || leaf.endsWith(`_${wanted}`);
  };
  const match =
    (wanted ? entries.find(([path]) => matchesSymbol(path)) : undefined) ??
    (entries.length === 1 ? entries[0] : undefined);
  if (!match) return null;

  const [key, body] = match;
  return { shape: "keyed", key: `${prefix}${key}`, body };
};

/**
 * Identifies the layout of a parsed response body. Throws
 * {@link EnvelopeFailureError} for an envelope reporting failure and
 * {@link NormalizationError} for a layout none of the decoders recognize.
 */
export const decodePayload = (raw: unknown, symbol?: string): DecodedPayload => {
  if (!isJsonObject(raw)) {
    throw new NormalizationError("Upstream payload is not a JSON object", raw);
  }

  const decoded = decodeEnvelope(raw) ?? decodeFlat(raw) ?? decodeKeyed(raw, symbol);
  if (!decoded) {
    throw new NormalizationError(
      `Unrecognized payload shape with keys [${Object.keys(raw).slice(0, 10).join(", ")}]`,
      raw
    );
  }
  return decoded;
};

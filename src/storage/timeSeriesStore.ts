import type { CanonicalFields, CanonicalRecord, FieldValue } from "../types/models";
import { isoDate, nowIso, quarterEnd } from "../utils/time";
import type { SqliteDatabase } from "./database";

interface ColumnSpec {
  column: string;
  field: string;
  type: "REAL" | "INTEGER" | "TEXT";
}

interface TableSpec {
  table: string;
  keyColumns: string[];
  columns: ColumnSpec[];
}

const real = (column: string, field = column): ColumnSpec => ({ column, field, type: "REAL" });
const integer = (column: string, field = column): ColumnSpec => ({ column, field, type: "INTEGER" });
const text = (column: string, field = column): ColumnSpec => ({ column, field, type: "TEXT" });

const PRICES: TableSpec = {
  table: "prices_daily",
  keyColumns: ["symbol", "date"],
  columns: [
    real("open"),
    real("high"),
    real("low"),
    real("close", "current_price"),
    real("prev_close"),
    integer("volume"),
    real("turnover"),
    integer("total_trades"),
    integer("delivery_qty", "delivery_quantity"),
    real("delivery_pct", "delivery_percentage"),
    real("vwap"),
    real("price_change_percent"),
    text("isin"),
    text("series")
  ]
};

const TECHNICALS: TableSpec = {
  table: "technical_indicators",
  keyColumns: ["symbol", "date"],
  columns: [
    real("sma_20"),
    real("sma_50"),
    real("sma_200"),
    real("ema_12"),
    real("ema_26"),
    real("rsi_14"),
    real("macd"),
    real("macd_signal"),
    real("macd_histogram"),
    real("bollinger_upper"),
    real("bollinger_lower"),
    real("atr_14"),
    real("adx_14"),
    real("obv"),
    real("support_level"),
    real("resistance_level")
  ]
};

const FUNDAMENTALS: TableSpec = {
  table: "fundamentals_quarterly",
  keyColumns: ["symbol", "period_end", "period_type"],
  columns: [
    real("revenue"),
    real("revenue_growth_yoy"),
    real("operating_profit"),
    real("operating_margin"),
    real("ebitda"),
    real("net_profit"),
    real("net_profit_margin"),
    real("profit_growth_yoy"),
    real("eps"),
    real("total_assets"),
    real("total_equity"),
    real("total_debt"),
    real("cash_and_equiv"),
    real("operating_cash_flow"),
    real("free_cash_flow"),
    real("roe"),
    real("roce"),
    real("debt_to_equity"),
    real("interest_coverage"),
    real("current_ratio"),
    real("pe_ratio"),
    real("pb_ratio"),
    real("market_cap")
  ]
};

const SHAREHOLDING: TableSpec = {
  table: "shareholding_quarterly",
  keyColumns: ["symbol", "quarter_end"],
  columns: [
    real("promoter_holding"),
    real("promoter_pledging"),
    real("fii_holding"),
    real("dii_holding"),
    real("public_holding"),
    real("mf_holding"),
    real("promoter_holding_change"),
    real("fii_holding_change"),
    integer("num_shareholders")
  ]
};

const TABLES = [PRICES, TECHNICALS, FUNDAMENTALS, SHAREHOLDING] as const;

export type ScreenerOperator = "gt" | "lt" | "gte" | "lte" | "eq" | "between";

export interface ScreenerFilter {
  metric: string;
  operator: ScreenerOperator;
  value: number;
  value2?: number;
}

export interface ScreenerQuery {
  filters: ScreenerFilter[];
  symbols?: string[];
  sortBy?: string;
  sortOrder?: "asc" | "desc";
  limit?: number;
}

export type ScreenerRow = Record<string, string | number | null>;

export interface PriceBar {
  symbol: string;
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  prevClose: number | null;
  volume: number | null;
  turnover: number | null;
  deliveryPct: number | null;
  vwap: number | null;
}

export interface UpsertReport {
  tables: string[];
  snapshotFields: number;
}

interface SnapshotRow {
  field: string;
  value_num: number | null;
  value_text: string | null;
  last_updated: string;
}

interface PriceRow {
  symbol: string;
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  prev_close: number | null;
  volume: number | null;
  turnover: number | null;
  delivery_pct: number | null;
  vwap: number | null;
}

const SCREENER_COLUMNS: Record<string, string> = {
  current_price: "p.close",
  close: "p.close",
  volume: "p.volume",
  turnover: "p.turnover",
  delivery_percentage: "p.delivery_pct",
  price_change_percent: "p.price_change_percent",
  ...Object.fromEntries(TECHNICALS.columns.map((spec) => [spec.field, `t.${spec.column}`])),
  ...Object.fromEntries(FUNDAMENTALS.columns.map((spec) => [spec.field, `f.${spec.column}`])),
  ...Object.fromEntries(SHAREHOLDING.columns.map((spec) => [spec.field, `s.${spec.column}`]))
};

const OPERATOR_SQL: Record<Exclude<ScreenerOperator, "between">, string> = {
  gt: ">",
  lt: "<",
  gte: ">=",
  lte: "<=",
  eq: "="
};

const columnValue = (spec: ColumnSpec, fields: CanonicalFields): string | number | null => {
  const value = fields[spec.field];
  if (value === undefined) return null;
  if (spec.type === "TEXT") return String(value);
  if (typeof value !== "number") return null;
  return spec.type === "INTEGER" ? Math.round(value) : value;
};

const textField = (fields: CanonicalFields, field: string): string | null => {
  const value = fields[field];
  return typeof value === "string" && value.length > 0 ? value : null;
};

/**
 * Authoritative store for normalized market data. Every write is an upsert on
 * the row's natural key, so replaying a record leaves one row per key.
 */
export class TimeSeriesStore {
  constructor(private readonly db: SqliteDatabase) {
    this.init();
  }

  private init(): void {
    for (const spec of TABLES) {
      const keyDefs = spec.keyColumns.map((column) => `${column} TEXT NOT NULL`);
      const columnDefs = spec.columns.map((column) => `${column.column} ${column.type}`);
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${spec.table} (
          ${[...keyDefs, ...columnDefs, "updated_at TEXT NOT NULL"].join(",\n          ")},
          PRIMARY KEY (${spec.keyColumns.join(", ")})
        );
      `);
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS field_snapshots (
        symbol TEXT NOT NULL,
        field TEXT NOT NULL,
        value_num REAL,
        value_text TEXT,
        last_updated TEXT NOT NULL,
        PRIMARY KEY (symbol, field)
      );

      CREATE TABLE IF NOT EXISTS app_state (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  /**
   * Writes one normalized record across every table it has data for, plus the
   * per-field snapshot. `fields` may carry alias keys; only canonical ones in
   * `canonicalFields` reach the snapshot.
   */
  upsertRecord(
    symbol: string,
    fields: CanonicalFields,
    options: { asOf?: string; canonicalFields?: string[] } = {}
  ): UpsertReport {
    const asOf = options.asOf ?? nowIso();
    const date = isoDate(asOf);
    // undated quarterly figures belong to the quarter the observation falls in
    const quarter = quarterEnd(asOf);
    const keyValues: Record<string, string> = {
      symbol,
      date,
      period_end: textField(fields, "period_end") ?? quarter,
      period_type: textField(fields, "period_type") ?? "quarterly",
      quarter_end: textField(fields, "quarter_end") ?? quarter
    };
    const snapshotFields = (options.canonicalFields ?? Object.keys(fields)).filter(
      (field) => fields[field] !== undefined
    );

    const write = this.db.transaction((): UpsertReport => {
      const tables: string[] = [];
      for (const spec of TABLES) {
        const present = spec.columns.filter((column) => columnValue(column, fields) !== null);
        if (present.length === 0) continue;
        this.upsertRow(spec, keyValues, present, fields, asOf);
        tables.push(spec.table);
      }

      const snapshot = this.db.prepare(
        `INSERT INTO field_snapshots (symbol, field, value_num, value_text, last_updated)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(symbol, field) DO UPDATE SET
           value_num = excluded.value_num,
           value_text = excluded.value_text,
           last_updated = excluded.last_updated`
      );
      for (const field of snapshotFields) {
        const value: FieldValue = fields[field];
        snapshot.run(
          symbol,
          field,
          typeof value === "number" ? value : null,
          typeof value === "string" ? value : null,
          asOf
        );
      }
      return { tables, snapshotFields: snapshotFields.length };
    });

    return write();
  }

  private upsertRow(
    spec: TableSpec,
    keyValues: Record<string, string>,
    present: ColumnSpec[],
    fields: CanonicalFields,
    asOf: string
  ): void {
    const columns = [...spec.keyColumns, ...present.map((column) => column.column), "updated_at"];
    const updates = present
      .map((column) => `${column.column} = excluded.${column.column}`)
      .concat("updated_at = excluded.updated_at");
    const values = [
      ...spec.keyColumns.map((column) => keyValues[column]),
      ...present.map((column) => columnValue(column, fields)),
      asOf
    ];

    this.db
      .prepare(
        `INSERT INTO ${spec.table} (${columns.join(", ")})
         VALUES (${columns.map(() => "?").join(", ")})
         ON CONFLICT(${spec.keyColumns.join(", ")}) DO UPDATE SET ${updates.join(", ")}`
      )
      .run(...values);
  }

  /** Latest snapshot of every field held for a symbol, with provenance against `expectedFields`. */
  loadCanonicalRecord(symbol: string, expectedFields: readonly string[] = []): CanonicalRecord | null {
    const rows = this.db
      .prepare<[string], SnapshotRow>(
        "SELECT field, value_num, value_text, last_updated FROM field_snapshots WHERE symbol = ?"
      )
      .all(symbol.toUpperCase());
    if (rows.length === 0) return null;

    const fields: CanonicalFields = {};
    const fieldLastUpdated: Record<string, string> = {};
    let asOf = rows[0].last_updated;
    for (const row of rows) {
      const value = row.value_num ?? row.value_text;
      if (value === null) continue;
      fields[row.field] = value;
      fieldLastUpdated[row.field] = row.last_updated;
      if (row.last_updated > asOf) asOf = row.last_updated;
    }

    const fieldAvailability: Record<string, boolean> = {};
    for (const field of new Set([...expectedFields, ...Object.keys(fields)])) {
      fieldAvailability[field] = fields[field] !== undefined;
    }

    return { symbol: symbol.toUpperCase(), asOf, fields, fieldAvailability, fieldLastUpdated };
  }

  getPrices(
    symbol: string,
    range: { startDate?: string; endDate?: string; limit?: number } = {}
  ): PriceBar[] {
    const clauses = ["symbol = ?"];
    const params: Array<string | number> = [symbol.toUpperCase()];
    if (range.startDate) {
      clauses.push("date >= ?");
      params.push(range.startDate);
    }
    if (range.endDate) {
      clauses.push("date <= ?");
      params.push(range.endDate);
    }
    params.push(Math.max(1, Math.min(range.limit ?? 365, 5_000)));

    const rows = this.db
      .prepare<Array<string | number>, PriceRow>(
        `SELECT symbol, date, open, high, low, close, prev_close, volume, turnover, delivery_pct, vwap
         FROM prices_daily
         WHERE ${clauses.join(" AND ")}
         ORDER BY date DESC
         LIMIT ?`
      )
      .all(...params);

    return rows.map((row) => ({
      symbol: row.symbol,
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      prevClose: row.prev_close,
      volume: row.volume,
      turnover: row.turnover,
      deliveryPct: row.delivery_pct,
      vwap: row.vwap
    }));
  }

  /**
   * Joins the latest price, technical, fundamental and shareholding rows per
   * symbol and filters them. Filters on unknown metrics are ignored.
   */
  screen(query: ScreenerQuery): ScreenerRow[] {
    const where: string[] = [];
    const params: Array<string | number> = [];

    for (const filter of query.filters) {
      const column = SCREENER_COLUMNS[filter.metric];
      if (!column) continue;
      if (filter.operator === "between") {
        if (filter.value2 === undefined) continue;
        where.push(`${column} BETWEEN ? AND ?`);
        params.push(Math.min(filter.value, filter.value2), Math.max(filter.value, filter.value2));
      } else {
        where.push(`${column} ${OPERATOR_SQL[filter.operator]} ?`);
        params.push(filter.value);
      }
    }

    const symbols = (query.symbols ?? []).map((symbol) => symbol.toUpperCase());
    if (symbols.length > 0) {
      where.push(`p.symbol IN (${symbols.map(() => "?").join(", ")})`);
      params.push(...symbols);
    }

    const sortColumn = (query.sortBy && SCREENER_COLUMNS[query.sortBy]) || "p.symbol";
    const sortOrder = query.sortOrder === "desc" ? "DESC" : "ASC";
    const limit = Math.max(1, Math.min(query.limit ?? 50, 500));
    params.push(limit);

    const latest = (table: string, orderColumn: string) =>
      `SELECT *, ROW_NUMBER() OVER (PARTITION BY symbol ORDER BY ${orderColumn} DESC) AS rn FROM ${table}`;

    return this.db
      .prepare<Array<string | number>, ScreenerRow>(
        `WITH latest_prices AS (${latest("prices_daily", "date")}),
              latest_technicals AS (${latest("technical_indicators", "date")}),
              latest_fundamentals AS (${latest("fundamentals_quarterly", "period_end")}),
              latest_shareholding AS (${latest("shareholding_quarterly", "quarter_end")})
         SELECT
           p.symbol AS symbol,
           p.date AS date,
           p.close AS current_price,
           p.volume AS volume,
           p.turnover AS turnover,
           p.delivery_pct AS delivery_percentage,
           p.price_change_percent AS price_change_percent,
           t.rsi_14 AS rsi_14,
           t.sma_50 AS sma_50,
           t.sma_200 AS sma_200,
           f.pe_ratio AS pe_ratio,
           f.roe AS roe,
           f.debt_to_equity AS debt_to_equity,
           f.revenue_growth_yoy AS revenue_growth_yoy,
           f.market_cap AS market_cap,
           s.promoter_holding AS promoter_holding,
           s.promoter_pledging AS promoter_pledging
         FROM latest_prices p
         LEFT JOIN latest_technicals t ON t.symbol = p.symbol AND t.rn = 1
         LEFT JOIN latest_fundamentals f ON f.symbol = p.symbol AND f.rn = 1
         LEFT JOIN latest_shareholding s ON s.symbol = p.symbol AND s.rn = 1
         WHERE p.rn = 1${where.length > 0 ? ` AND ${where.join(" AND ")}` : ""}
         ORDER BY ${sortColumn} ${sortOrder} NULLS LAST, p.symbol ASC
         LIMIT ?`
      )
      .all(...params);
  }

  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const table of [...TABLES.map((spec) => spec.table), "field_snapshots"]) {
      const row = this.db
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)
        .get();
      stats[table] = row?.count ?? 0;
    }
    const symbols = this.db
      .prepare<[], { count: number }>("SELECT COUNT(DISTINCT symbol) AS count FROM field_snapshots")
      .get();
    stats.distinct_symbols = symbols?.count ?? 0;
    return stats;
  }

  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    return row?.ok === 1;
  }

  setAppState(key: string, payload: unknown): void {
    this.db
      .prepare(
        `INSERT INTO app_state (key, payload, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`
      )
      .run(key, JSON.stringify(payload), nowIso());
  }

  /** Raw persisted value; callers validate its shape. */
  getAppState(key: string): unknown {
    const row = this.db
      .prepare<[string], { payload: string }>("SELECT payload FROM app_state WHERE key = ?")
      .get(key);
    if (!row) return null;
    try {
      return JSON.parse(row.payload);
    } catch {
      return null;
    }
  }
}

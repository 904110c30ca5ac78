import { readFileSync } from "node:fs";
import { z } from "zod";

export interface UniverseCategory {
  id: string;
  label: string;
  symbols: string[];
}

export interface AppStatePersistence {
  getAppState(key: string): unknown;
  setAppState(key: string, payload: unknown): void;
}

export interface AddSymbolsResult {
  category: string;
  added: string[];
  alreadyExists: string[];
  totalSymbols: number;
}

export interface RemoveSymbolsResult {
  removed: string[];
  notFound: string[];
  totalSymbols: number;
}

const universeFileSchema = z.object({
  categories: z.record(
    z.object({
      label: z.string().min(1),
      symbols: z.array(z.string().min(1))
    })
  )
});

const persistedSchema = z.array(
  z.object({
    id: z.string().min(1),
    label: z.string().min(1),
    symbols: z.array(z.string())
  })
);

const SYMBOL_PATTERN = /^[A-Z0-9][A-Z0-9&._-]{0,29}$/;

export const normalizeSymbols = (symbols: readonly string[]): string[] => {
  const normalized = symbols
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => SYMBOL_PATTERN.test(symbol));
  return [...new Set(normalized)];
};

export const loadDefaultUniverse = (): UniverseCategory[] => {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../data/universe.json", import.meta.url), "utf8")
  );
  const parsed = universeFileSchema.parse(raw);
  return Object.entries(parsed.categories).map(([id, category]) => ({
    id,
    label: category.label,
    symbols: normalizeSymbols(category.symbols)
  }));
};

const cloneCategories = (categories: readonly UniverseCategory[]): UniverseCategory[] =>
  categories.map((category) => ({ ...category, symbols: [...category.symbols] }));

/**
 * Tracked symbols, partitioned into named categories. A symbol belongs to at
 * most one category. Edits are persisted and take effect on the next job.
 */
export class SymbolUniverseService {
  private static readonly stateKey = "symbol_universe_v1";
  private readonly defaults: UniverseCategory[];
  private categories: UniverseCategory[];

  constructor(
    private readonly persistence?: AppStatePersistence,
    defaults: UniverseCategory[] = loadDefaultUniverse()
  ) {
    this.defaults = cloneCategories(defaults);
    this.categories = cloneCategories(defaults);
    this.loadPersisted();
  }

  listCategories(): Array<UniverseCategory & { count: number }> {
    return this.categories.map((category) => ({
      ...category,
      symbols: [...category.symbols],
      count: category.symbols.length
    }));
  }

  getDefaultCategories(): UniverseCategory[] {
    return cloneCategories(this.defaults);
  }

  allSymbols(): string[] {
    return this.categories.flatMap((category) => category.symbols);
  }

  totalSymbols(): number {
    return this.categories.reduce((total, category) => total + category.symbols.length, 0);
  }

  categoryOf(symbol: string): string | null {
    const wanted = symbol.toUpperCase();
    return this.categories.find((category) => category.symbols.includes(wanted))?.id ?? null;
  }

  addSymbols(symbols: readonly string[], categoryId?: string): AddSymbolsResult {
    const target = categoryId
      ? this.ensureCategory(categoryId)
      : this.categories[this.categories.length - 1] ?? this.ensureCategory("custom");

    const added: string[] = [];
    const alreadyExists: string[] = [];
    for (const symbol of normalizeSymbols(symbols)) {
      if (this.categoryOf(symbol) !== null) {
        alreadyExists.push(symbol);
        continue;
      }
      target.symbols.push(symbol);
      added.push(symbol);
    }

    if (added.length > 0) this.persist();
    return { category: target.id, added, alreadyExists, totalSymbols: this.totalSymbols() };
  }

  removeSymbols(symbols: readonly string[]): RemoveSymbolsResult {
    const removed: string[] = [];
    const notFound: string[] = [];
    for (const symbol of normalizeSymbols(symbols)) {
      const category = this.categories.find((entry) => entry.symbols.includes(symbol));
      if (!category) {
        notFound.push(symbol);
        continue;
      }
      category.symbols = category.symbols.filter((entry) => entry !== symbol);
      removed.push(symbol);
    }

    if (removed.length > 0) this.persist();
    return { removed, notFound, totalSymbols: this.totalSymbols() };
  }

  reset(): UniverseCategory[] {
    this.categories = cloneCategories(this.defaults);
    this.persist();
    return this.listCategories();
  }

  private ensureCategory(categoryId: string): UniverseCategory {
    const id = categoryId.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_");
    const existing = this.categories.find((category) => category.id === id);
    if (existing) return existing;
    const created: UniverseCategory = { id, label: categoryId.trim(), symbols: [] };
    this.categories.push(created);
    return created;
  }

  private persist(): void {
    if (!this.persistence) return;
    this.persistence.setAppState(SymbolUniverseService.stateKey, this.categories);
  }

  private loadPersisted(): void {
    if (!this.persistence) return;
    const parsed = persistedSchema.safeParse(
      this.persistence.getAppState(SymbolUniverseService.stateKey)
    );
    if (!parsed.success) return;

    const seen = new Set<string>();
    this.categories = parsed.data.map((category) => {
      const symbols = normalizeSymbols(category.symbols).filter((symbol) => !seen.has(symbol));
      for (const symbol of symbols) seen.add(symbol);
      return { id: category.id, label: category.label, symbols };
    });
  }
}

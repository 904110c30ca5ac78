import { readFileSync } from "node:fs";
import { z } from "zod";

const catalogSchema = z.object({
  categories: z.record(z.array(z.string().min(1))),
  textFields: z.array(z.string().min(1))
});

const aliasSchema = z.record(
  z.object({
    upstream: z.array(z.string().min(1)),
    emit: z.array(z.string().min(1))
  })
);

export interface FieldAliases {
  upstream: string[];
  emit: string[];
}

export interface FieldCatalog {
  categories: Record<string, string[]>;
  fields: string[];
  textFields: ReadonlySet<string>;
  categoryOf: ReadonlyMap<string, string>;
  aliases: Readonly<Record<string, FieldAliases>>;
}

const readJson = (relativePath: string): unknown =>
  JSON.parse(readFileSync(new URL(relativePath, import.meta.url), "utf8"));

export const loadFieldCatalog = (): FieldCatalog => {
  const catalog = catalogSchema.parse(readJson("../data/canonicalFields.json"));
  const aliases = aliasSchema.parse(readJson("../data/fieldAliases.json"));

  const categoryOf = new Map<string, string>();
  for (const [category, fields] of Object.entries(catalog.categories)) {
    for (const field of fields) categoryOf.set(field, category);
  }
  for (const field of Object.keys(aliases)) {
    if (!categoryOf.has(field)) {
      throw new Error(`Alias table references unknown field "${field}"`);
    }
  }

  return {
    categories: catalog.categories,
    fields: [...categoryOf.keys()],
    textFields: new Set(catalog.textFields),
    categoryOf,
    aliases
  };
};

export const fieldCatalog: FieldCatalog = loadFieldCatalog();

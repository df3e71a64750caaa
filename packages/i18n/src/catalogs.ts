import { z } from "zod";
import { ConfigurationError, type Translations } from "@formwire/shared-types";
import de from "./locales/de.json";
import fr from "./locales/fr.json";
import zh from "./locales/zh.json";
import { toLanguageTag } from "./locale-tag";
import { CatalogTranslations, identityTranslations } from "./translations";

export const messageCatalogSchema = z.object({
  locale: z.string().min(1),
  messages: z.record(z.union([z.string(), z.record(z.string())]))
});

export type MessageCatalog = z.infer<typeof messageCatalogSchema>;

export type CatalogSet = ReadonlyMap<string, MessageCatalog>;

export function loadCatalog(raw: unknown): MessageCatalog {
  const parsed = messageCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid message catalog: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  return parsed.data;
}

export function catalogSet(catalogs: readonly unknown[]): CatalogSet {
  const out = new Map<string, MessageCatalog>();
  for (const raw of catalogs) {
    const catalog = loadCatalog(raw);
    out.set(catalog.locale.toLowerCase(), catalog);
  }
  return out;
}

export const builtinCatalogs: CatalogSet = catalogSet([de, fr, zh]);

function findCatalog(locale: string, catalogs: CatalogSet): MessageCatalog | undefined {
  const normalized = toLanguageTag(locale).toLowerCase();
  const exact = catalogs.get(normalized);
  if (exact) return exact;
  const [language] = normalized.split("-");
  return language ? catalogs.get(language) : undefined;
}

/**
 * Translations for the first locale that has a catalog, identity when none does.
 */
export function createTranslations(
  locales: readonly string[] | null,
  catalogs: CatalogSet = builtinCatalogs
): Translations {
  for (const locale of locales ?? []) {
    const catalog = findCatalog(locale, catalogs);
    if (catalog) return new CatalogTranslations(toLanguageTag(locale), catalog);
  }
  return identityTranslations;
}

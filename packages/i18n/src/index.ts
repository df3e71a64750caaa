export { CatalogTranslations, IdentityTranslations, identityTranslations } from "./translations";
export {
  builtinCatalogs,
  catalogSet,
  createTranslations,
  loadCatalog,
  messageCatalogSchema,
  type CatalogSet,
  type MessageCatalog
} from "./catalogs";
export { sharedTranslationCache, TranslationCache, type LocaleKey } from "./translation-cache";
export { intlNumberLocale, type NumberFormatSpec, type NumberLocale } from "./number-locale";
export { isLanguageTag, toLanguageTag } from "./locale-tag";

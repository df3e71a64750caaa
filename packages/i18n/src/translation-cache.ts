import type { Translations } from "@formwire/shared-types";

export type LocaleKey = readonly string[] | null;

/**
 * Process-wide store of translation objects keyed by locale tuple.
 *
 * Entries are never invalidated individually. `resolve` computes outside the store and
 * inserts afterwards, so two callers racing on the same key both end up with an
 * equivalent value and whichever insert lands last stays.
 */
export class TranslationCache {
  private store = new Map<string, Translations>();

  get size(): number {
    return this.store.size;
  }

  get(locales: LocaleKey): Translations | undefined {
    return this.store.get(this.keyOf(locales));
  }

  set(locales: LocaleKey, translations: Translations): void {
    this.store.set(this.keyOf(locales), translations);
  }

  resolve(locales: LocaleKey, factory: (locales: LocaleKey) => Translations): { translations: Translations; hit: boolean } {
    const hit = this.get(locales);
    if (hit) return { translations: hit, hit: true };
    const translations = factory(locales);
    this.set(locales, translations);
    return { translations, hit: false };
  }

  clear(): void {
    this.store.clear();
  }

  private keyOf(locales: LocaleKey): string {
    return JSON.stringify(locales);
  }
}

export const sharedTranslationCache = new TranslationCache();

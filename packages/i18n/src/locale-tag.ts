/**
 * Locales may arrive in the `de_AT` spelling; `Intl` only takes BCP 47 tags.
 */
export function toLanguageTag(locale: string): string {
  return locale.replace(/_/g, "-");
}

export function isLanguageTag(locale: string): boolean {
  try {
    Intl.getCanonicalLocales(toLanguageTag(locale));
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

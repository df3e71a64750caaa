import type { Translations } from "@formwire/shared-types";
import type { MessageCatalog } from "./catalogs";

export class IdentityTranslations implements Translations {
  gettext(message: string): string {
    return message;
  }

  ngettext(singular: string, plural: string, n: number): string {
    return n === 1 ? singular : plural;
  }
}

export const identityTranslations: Translations = new IdentityTranslations();

export class CatalogTranslations implements Translations {
  private readonly pluralRules: Intl.PluralRules;

  constructor(
    readonly locale: string,
    private readonly catalog: MessageCatalog
  ) {
    this.pluralRules = new Intl.PluralRules(locale);
  }

  gettext(message: string): string {
    const entry = this.catalog.messages[message];
    if (typeof entry === "string") return entry;
    return entry?.other ?? message;
  }

  ngettext(singular: string, plural: string, n: number): string {
    const entry = this.catalog.messages[singular];
    if (typeof entry === "string") return entry;
    const translated = entry?.[this.pluralRules.select(n)] ?? entry?.other;
    if (translated) return translated;
    return identityTranslations.ngettext(singular, plural, n);
  }
}

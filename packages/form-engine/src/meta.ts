import { Logger } from "@nestjs/common";
import { z } from "zod";
import {
  builtinCatalogs,
  createTranslations,
  intlNumberLocale,
  isLanguageTag,
  sharedTranslationCache,
  TranslationCache,
  type CatalogSet,
  type NumberLocale
} from "@formwire/i18n";
import { ConfigurationError, isFormInput, type FormInput, type Translations } from "@formwire/shared-types";
import { isFormRecord, isGetAllMultiDict, MultiDictFormInput, RecordFormInput } from "./form-input";
import type { BindOptions, BoundField, FieldDeclaration, FormContext } from "./types";

export interface FormMetaOptions {
  locales: readonly string[] | false;
  cacheTranslations: boolean;
  translationCache: TranslationCache;
  catalogs: CatalogSet;
  numberLocale: NumberLocale;
}

function isNumberLocale(value: unknown): value is NumberLocale {
  return (
    typeof value === "object" &&
    value !== null &&
    "parseDecimal" in value &&
    typeof value.parseDecimal === "function" &&
    "formatDecimal" in value &&
    typeof value.formatDecimal === "function"
  );
}

const metaOptionsSchema = z
  .object({
    locales: z.union([z.literal(false), z.array(z.string().min(1).refine(isLanguageTag, "not a valid locale"))]),
    cacheTranslations: z.boolean(),
    translationCache: z.instanceof(TranslationCache),
    catalogs: z.custom<CatalogSet>((value) => value instanceof Map, "catalogs must be a Map of message catalogs"),
    numberLocale: z.custom<NumberLocale>(isNumberLocale, "numberLocale must provide parseDecimal and formatDecimal")
  })
  .partial()
  .strict();

function parseMetaOptions(values: unknown): Partial<FormMetaOptions> {
  const parsed = metaOptionsSchema.safeParse(values);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  throw new ConfigurationError(`Invalid form meta option ${issue ? `'${issue.path.join(".")}': ${issue.message}` : ""}`);
}

/**
 * Form-wide configuration: how fields are bound, how wire input is adapted and where
 * translations and locale-aware number handling come from.
 */
export class FormMeta implements FormMetaOptions {
  private readonly logger = new Logger(FormMeta.name);

  locales: readonly string[] | false = false;
  cacheTranslations = true;
  translationCache: TranslationCache = sharedTranslationCache;
  catalogs: CatalogSet = builtinCatalogs;
  numberLocale: NumberLocale = intlNumberLocale;

  constructor(values: Partial<FormMetaOptions> = {}) {
    this.update(values);
  }

  get primaryLocale(): string | undefined {
    return this.locales ? this.locales[0] : undefined;
  }

  bindField<F extends BoundField>(
    form: FormContext | undefined,
    declaration: FieldDeclaration<F>,
    name: string,
    options: BindOptions = {}
  ): F {
    return declaration.bind(form, name, options);
  }

  wrapFormdata(_form: FormContext | undefined, formdata: unknown): FormInput | undefined {
    if (formdata === undefined || formdata === null) return undefined;
    if (isFormInput(formdata)) return formdata;
    if (isGetAllMultiDict(formdata)) {
      this.logger.debug("Adapting getall-style multidict input");
      return new MultiDictFormInput(formdata);
    }
    if (formdata instanceof Map) {
      this.logger.debug("Adapting Map input");
      return new RecordFormInput(formdata);
    }
    if (isFormRecord(formdata)) {
      this.logger.debug("Adapting plain record input");
      return RecordFormInput.fromRecord(formdata);
    }
    throw new ConfigurationError(
      "formdata should provide has/getAll/keys, a getall-style multidict, a Map or a record of strings"
    );
  }

  getTranslations(_form: FormContext | undefined): Translations | undefined {
    if (this.locales === false) return undefined;
    const key = this.locales.length > 0 ? this.locales : null;
    if (!this.cacheTranslations) return createTranslations(key, this.catalogs);

    const { translations, hit } = this.translationCache.resolve(key, (locales) => createTranslations(locales, this.catalogs));
    if (!hit) this.logger.debug(`Translations cached for locales ${JSON.stringify(key)}`);
    return translations;
  }

  update(values: Partial<FormMetaOptions>): this {
    const parsed = parseMetaOptions(values);
    if (parsed.locales !== undefined) this.locales = parsed.locales;
    if (parsed.cacheTranslations !== undefined) this.cacheTranslations = parsed.cacheTranslations;
    if (parsed.translationCache) this.translationCache = parsed.translationCache;
    if (parsed.catalogs) this.catalogs = parsed.catalogs;
    if (parsed.numberLocale) this.numberLocale = parsed.numberLocale;
    return this;
  }
}

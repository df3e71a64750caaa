import {
  ConfigurationError,
  isUnset,
  resolveDefault,
  UNSET,
  ValueError,
  type FieldDefault,
  type FormInput,
  type Translations
} from "@formwire/shared-types";
import { identityTranslations } from "@formwire/i18n";
import {
  applyOutcomes,
  arraySink,
  runValidationChain,
  type ValidationOutcome,
  type Validator
} from "@formwire/validation-engine";
import type { FormMeta } from "./meta";
import { baseFieldOptionsSchema, checkOptions, fieldOptionsSchema } from "./options";
import type { BindContext, BoundField, FieldErrors, FieldFilter, FormContext } from "./types";

export interface BaseFieldOptions {
  label?: string;
  description?: string;
  id?: string;
  attributes?: Readonly<Record<string, string>>;
}

export interface FieldOptions<T> extends BaseFieldOptions {
  default?: FieldDefault<T | null>;
  validators?: readonly Validator[];
  filters?: readonly FieldFilter<T | null>[];
}

export type PreValidateResult = ValidationOutcome | readonly ValidationOutcome[] | void;

function titleCase(name: string): string {
  return name
    .replace(/_/g, " ")
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Identity and context shared by every bound field: wire name, id, label, meta and
 * translations. Data handling lives in the subclasses.
 */
export abstract class BaseField implements BoundField {
  abstract readonly type: string;
  abstract readonly data: unknown;
  abstract readonly rawData: readonly string[] | undefined;
  abstract readonly errors: FieldErrors;
  abstract readonly processErrors: readonly string[];
  abstract readonly objectData: unknown;

  readonly inputType: string | undefined = undefined;
  readonly name: string;
  readonly shortName: string;
  readonly prefix: string;
  readonly id: string;
  readonly label: string;
  readonly description: string;
  readonly creationCounter: number;
  readonly meta: FormMeta;
  /** The form this field was bound to; unset for list entries. */
  readonly owner: FormContext | undefined;
  protected readonly translations: Translations;
  private readonly extraAttributes: Readonly<Record<string, string>>;

  constructor(options: BaseFieldOptions, context: BindContext) {
    checkOptions(baseFieldOptionsSchema, options, new.target.name);
    const meta = context.meta ?? context.form?.meta;
    if (!meta) throw new ConfigurationError(`${new.target.name} '${context.name}' needs a form or a meta to bind to`);

    this.meta = meta;
    this.owner = context.form;
    this.translations = context.translations ?? identityTranslations;
    this.shortName = context.name;
    this.prefix = context.prefix ?? "";
    this.name = this.prefix + context.name;
    this.id = context.id ?? options.id ?? this.name;
    this.description = options.description ?? "";
    this.creationCounter = context.creationCounter ?? 0;
    this.extraAttributes = options.attributes ?? {};
    this.label = options.label ?? this.gettext(titleCase(context.name));
  }

  get attributes(): Readonly<Record<string, string>> {
    const base: Record<string, string> = { id: this.id, name: this.name };
    if (this.inputType) base.type = this.inputType;
    return { ...base, ...this.extraAttributes };
  }

  gettext(message: string): string {
    return this.translations.gettext(message);
  }

  ngettext(singular: string, plural: string, n: number): string {
    return this.translations.ngettext(singular, plural, n);
  }

  abstract process(formdata: FormInput | undefined, data?: unknown): void;
  abstract validate(form?: FormContext, extraValidators?: readonly Validator[]): boolean;
  abstract populateObj(obj: object, name: string): void;

  toString(): string {
    return `<${this.type} name=${JSON.stringify(this.name)}>`;
  }
}

/**
 * A single-valued field. `process` resolves the default, absorbs object data, overlays wire
 * data and runs filters. Wire coercion failures end up in `processErrors` instead of escaping.
 */
export abstract class Field<TData> extends BaseField {
  data: TData | null = null;
  rawData: readonly string[] | undefined = undefined;
  objectData: unknown = undefined;
  processErrors: string[] = [];

  protected readonly validators: readonly Validator[];
  protected readonly filters: readonly FieldFilter<TData | null>[];
  protected readonly defaultValue: FieldDefault<unknown>;
  private errorList: string[] = [];

  constructor(options: FieldOptions<TData>, context: BindContext) {
    super(options, context);
    checkOptions(fieldOptionsSchema, options, new.target.name);
    this.validators = [...(options.validators ?? [])];
    this.filters = [...(options.filters ?? [])];
    this.defaultValue = options.default ?? null;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  process(formdata: FormInput | undefined, data: unknown = UNSET): void {
    this.processErrors = [];
    const value = isUnset(data) ? resolveDefault(this.defaultValue) : data;
    this.objectData = value;

    this.capture(() => this.processData(value));

    if (formdata) {
      this.rawData = formdata.has(this.name) ? [...formdata.getAll(this.name)] : [];
      const rawData = this.rawData;
      this.capture(() => this.processFormdata(rawData));
    }

    this.capture(() => {
      for (const filter of this.filters) {
        this.data = filter(this.data);
      }
    });
  }

  processData(value: unknown): void {
    this.data = this.fromObject(value);
  }

  processFormdata(values: readonly string[]): void {
    const [first] = values;
    if (first !== undefined) this.data = this.fromWire(first);
  }

  validate(form?: FormContext, extraValidators: readonly Validator[] = []): boolean {
    const errors: string[] = [...this.processErrors];
    const sink = arraySink(errors);

    let stopped = applyOutcomes(this.preValidate(form), sink);
    if (!stopped) stopped = runValidationChain(form, this, [...this.validators, ...extraValidators], sink);
    applyOutcomes(this.postValidate(form, stopped), sink);

    this.errorList = errors;
    return errors.length === 0;
  }

  preValidate(_form: FormContext | undefined): PreValidateResult {
    return;
  }

  postValidate(_form: FormContext | undefined, _stopped: boolean): PreValidateResult {
    return;
  }

  populateObj(obj: object, name: string): void {
    Reflect.set(obj, name, this.data);
  }

  value(): string {
    return this.data === null ? "" : String(this.data);
  }

  protected abstract fromObject(value: unknown): TData | null;
  protected abstract fromWire(value: string): TData | null;

  /**
   * Shared by numeric and temporal kinds: the wire value is kept in `rawData` for
   * redisplay while `data` is nulled.
   */
  protected parseOrReject<T extends TData>(parse: () => T, message: string): T {
    try {
      return parse();
    } catch (error) {
      if (!(error instanceof ValueError)) throw error;
      this.data = null;
      throw new ValueError(this.gettext(message));
    }
  }

  /**
   * Object data that does not parse is dropped without an error; only wire input is
   * reported back to the user.
   */
  protected parseOrNull<T extends TData>(parse: () => T): T | null {
    try {
      return parse();
    } catch (error) {
      if (!(error instanceof ValueError)) throw error;
      return null;
    }
  }

  private capture(step: () => void): void {
    try {
      step();
    } catch (error) {
      if (!(error instanceof ValueError)) throw error;
      this.processErrors.push(error.message);
    }
  }
}

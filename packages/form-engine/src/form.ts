import { Logger } from "@nestjs/common";
import { ConfigurationError, type Translations } from "@formwire/shared-types";
import type { Validator } from "@formwire/validation-engine";
import { FormMeta, type FormMetaOptions } from "./meta";
import type { BoundField, FieldDeclaration, FieldErrors, FormContext, FormErrors, FormValues } from "./types";
import { isUnboundField } from "./unbound-field";

export type FormSchema = Readonly<Record<string, FieldDeclaration>>;

export type FieldValidators = Readonly<Record<string, readonly Validator[]>>;

export interface FormDefinitionOptions {
  meta?: Partial<FormMetaOptions>;
  /** Extra validators per field name, run after the field's own. */
  validators?: FieldValidators;
}

export interface FormCreateOptions {
  formdata?: unknown;
  obj?: object;
  data?: Readonly<Record<string, unknown>>;
  prefix?: string;
  meta?: Partial<FormMetaOptions>;
}

const PREFIX_SEPARATORS = "-_;:/.";

function normalizePrefix(prefix: string): string {
  if (!prefix) return prefix;
  return PREFIX_SEPARATORS.includes(prefix.charAt(prefix.length - 1)) ? prefix : `${prefix}-`;
}

function isErrorList(errors: FieldErrors): errors is ReadonlyArray<string | FieldErrors> {
  return Array.isArray(errors);
}

function hasErrors(errors: FieldErrors): boolean {
  return isErrorList(errors) ? errors.length > 0 : Object.keys(errors).length > 0;
}

/**
 * A bound form: one field per declaration, bound in declaration order.
 */
export class Form implements FormContext, Iterable<BoundField> {
  private readonly logger = new Logger(Form.name);
  private readonly fields = new Map<string, BoundField>();

  readonly meta: FormMeta;
  readonly prefix: string;
  readonly translations: Translations | undefined;

  constructor(
    readonly definition: FormDefinition,
    options: FormCreateOptions = {}
  ) {
    this.meta = new FormMeta({ ...definition.options.meta, ...options.meta });
    this.prefix = normalizePrefix(options.prefix ?? "");
    this.translations = this.meta.getTranslations(this);

    for (const [name, declaration] of definition.declarations()) {
      const field = this.meta.bindField(this, declaration, name, { prefix: this.prefix, translations: this.translations });
      this.fields.set(name, field);
    }
    this.logger.verbose(`Bound ${this.fields.size} fields${this.prefix ? ` with prefix '${this.prefix}'` : ""}`);

    this.process(options.formdata, options.obj, options.data);
  }

  get size(): number {
    return this.fields.size;
  }

  get data(): FormValues {
    const values: FormValues = {};
    for (const [name, field] of this.fields) {
      values[name] = field.data;
    }
    return values;
  }

  get errors(): FormErrors {
    const errors: Record<string, FieldErrors> = {};
    for (const [name, field] of this.fields) {
      if (hasErrors(field.errors)) errors[name] = field.errors;
    }
    return errors;
  }

  [Symbol.iterator](): Iterator<BoundField> {
    return this.fields.values();
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  getField(name: string): BoundField | undefined {
    return this.fields.get(name);
  }

  /**
   * Looks a field up and checks its class, for callers that need the concrete field API.
   */
  fieldAs<F extends BoundField>(name: string, fieldClass: abstract new (...args: never[]) => F): F {
    const field = this.fields.get(name);
    if (field instanceof fieldClass) return field;
    throw new ConfigurationError(
      field ? `Field '${name}' is a ${field.type}, not a ${fieldClass.name}` : `Form has no field '${name}'`
    );
  }

  /**
   * Object attributes win over `data` entries. Fields found in neither fall back to their
   * default.
   */
  process(formdata?: unknown, obj?: object, data?: Readonly<Record<string, unknown>>): void {
    const input = this.meta.wrapFormdata(this, formdata);
    for (const [name, field] of this.fields) {
      if (obj && name in obj) field.process(input, Reflect.get(obj, name));
      else if (data && Object.hasOwn(data, name)) field.process(input, data[name]);
      else field.process(input);
    }
  }

  validate(extraValidators: FieldValidators = {}): boolean {
    const inline = this.definition.options.validators ?? {};
    const failed: string[] = [];
    for (const [name, field] of this.fields) {
      const extra = [...(inline[name] ?? []), ...(extraValidators[name] ?? [])];
      if (!field.validate(this, extra)) failed.push(name);
    }
    if (failed.length > 0) this.logger.debug(`Validation failed for ${failed.join(", ")}`);
    return failed.length === 0;
  }

  populateObj(obj: object): void {
    for (const [name, field] of this.fields) {
      field.populateObj(obj, name);
    }
  }
}

/**
 * A declared form: its field declarations and form-level options. `create` binds a fresh
 * form instance.
 */
export class FormDefinition {
  readonly schema: FormSchema;
  readonly options: FormDefinitionOptions;

  constructor(schema: FormSchema, options: FormDefinitionOptions = {}) {
    this.schema = { ...schema };
    this.options = options;
    for (const [name, declaration] of Object.entries(this.schema)) {
      if (!isUnboundField(declaration)) {
        throw new ConfigurationError(`Field '${name}' must be a field declaration, not a bound field or a plain value`);
      }
    }
    for (const name of Object.keys(options.validators ?? {})) {
      if (!Object.hasOwn(this.schema, name)) throw new ConfigurationError(`Validators given for unknown field '${name}'`);
    }
  }

  declarations(): Array<[string, FieldDeclaration]> {
    return Object.entries(this.schema).sort(([, a], [, b]) => a.creationCounter - b.creationCounter);
  }

  create(options: FormCreateOptions = {}): Form {
    return new Form(this, options);
  }
}

export function defineForm(schema: FormSchema, options: FormDefinitionOptions = {}): FormDefinition {
  return new FormDefinition(schema, options);
}

import { Logger } from "@nestjs/common";
import {
  ConfigurationError,
  hasAnyKey,
  isUnset,
  resolveDefault,
  UNSET,
  type FieldDefault,
  type FormInput
} from "@formwire/shared-types";
import { arraySink, runValidationChain, type Validator } from "@formwire/validation-engine";
import { z } from "zod";
import { BaseField, type BaseFieldOptions } from "./base-field";
import { checkOptions } from "./options";
import type { BindContext, BoundField, FieldDeclaration, FieldErrors, FormContext } from "./types";
import { isUnboundField } from "./unbound-field";

export interface FieldListOptions<F extends BoundField = BoundField> extends BaseFieldOptions {
  /** Declaration every entry is bound from. */
  field: FieldDeclaration<F>;
  minEntries?: number;
  maxEntries?: number;
  default?: FieldDefault<Iterable<unknown> | null>;
  validators?: readonly Validator[];
  filters?: readonly unknown[];
}

const fieldListOptionsSchema = z
  .object({
    minEntries: z.number().int().min(0).optional(),
    maxEntries: z.number().int().min(1).optional()
  })
  .passthrough()
  .refine((options) => options.maxEntries === undefined || (options.minEntries ?? 0) <= options.maxEntries, {
    message: "minEntries cannot exceed maxEntries",
    path: ["minEntries"]
  });

const INDEX_SEGMENT = /^\d+$/;

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}

function isEmpty(value: unknown): boolean {
  if (!value) return true;
  return Array.isArray(value) && value.length === 0;
}

/**
 * An ordered list of entries bound from one declaration. Entry names carry the wire index
 * they came from (`people-0`, `people-2`), and new entries continue after `lastIndex`.
 */
export class FieldList<F extends BoundField = BoundField> extends BaseField {
  private readonly logger = new Logger(FieldList.name);

  readonly type: string = "FieldList";
  readonly rawData: readonly string[] | undefined = undefined;
  readonly processErrors: readonly string[] = [];
  readonly minEntries: number;
  readonly maxEntries: number | undefined;
  entries: F[] = [];
  lastIndex = -1;
  objectData: unknown = undefined;

  private readonly template: FieldDeclaration<F>;
  private readonly validators: readonly Validator[];
  private readonly defaultValue: FieldDefault<unknown>;
  private errorList: Array<string | FieldErrors> = [];

  constructor(options: FieldListOptions<F>, context: BindContext) {
    super(options, context);
    checkOptions(fieldListOptionsSchema, options, new.target.name);
    if (options.filters && options.filters.length > 0) {
      throw new ConfigurationError("FieldList does not accept any filters. Instead, define them on the enclosed field.");
    }
    if (!isUnboundField(options.field)) {
      throw new ConfigurationError("FieldList needs a field declaration, not a bound field or a field class");
    }
    this.template = options.field;
    this.minEntries = options.minEntries ?? 0;
    this.maxEntries = options.maxEntries;
    this.validators = [...(options.validators ?? [])];
    this.defaultValue = options.default ?? [];
  }

  get data(): unknown[] {
    return this.entries.map((entry) => entry.data);
  }

  get errors(): ReadonlyArray<string | FieldErrors> {
    return this.errorList;
  }

  get length(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<F> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * With formdata, entries follow the indices found under `<name>-<index>` in ascending
   * order and take object data positionally. Without it, there is one entry per object
   * item. Either way the list is padded to `minEntries`.
   */
  process(formdata: FormInput | undefined, data: unknown = UNSET): void {
    this.entries = [];
    this.lastIndex = -1;

    const value = isUnset(data) || isEmpty(data) ? resolveDefault(this.defaultValue) : data;
    this.objectData = value;
    const items = this.itemsOf(value);

    if (formdata && hasAnyKey(formdata)) {
      const indices = this.boundedIndices(formdata);
      const iterator = items[Symbol.iterator]();
      for (const index of indices) {
        const next = iterator.next();
        this.addEntry(formdata, next.done ? UNSET : next.value, index);
      }
    } else {
      for (const item of items) {
        this.addEntry(formdata, item);
      }
    }

    while (this.entries.length < this.minEntries) {
      this.addEntry(formdata);
    }
  }

  /**
   * Entries are validated first, then the list's own chain runs regardless of how they
   * did. A failing entry contributes its whole error list as one element.
   */
  validate(form?: FormContext, extraValidators: readonly Validator[] = []): boolean {
    const errors: Array<string | FieldErrors> = [];
    for (const entry of this.entries) {
      if (!entry.validate(form)) errors.push(entry.errors);
    }
    runValidationChain(form, this, [...this.validators, ...extraValidators], arraySink(errors));
    this.errorList = errors;
    return errors.length === 0;
  }

  populateObj(obj: object, name: string): void {
    const existing: unknown = Reflect.get(obj, name);
    const current = isIterable(existing) ? [...existing] : [];
    const output = this.entries.map((entry, position) => {
      const carrier: { data: unknown } = { data: position < current.length ? current[position] : null };
      entry.populateObj(carrier, "data");
      return carrier.data;
    });
    Reflect.set(obj, name, output);
  }

  /**
   * Adds an entry from object data only; appended entries never see formdata.
   */
  appendEntry(data: unknown = UNSET): F {
    return this.addEntry(undefined, data);
  }

  popEntry(): F {
    const entry = this.entries.pop();
    if (!entry) throw new RangeError(`Cannot pop an entry from the empty FieldList '${this.name}'`);
    this.lastIndex -= 1;
    return entry;
  }

  private addEntry(formdata?: FormInput, data: unknown = UNSET, index?: number): F {
    if (this.maxEntries !== undefined && this.entries.length >= this.maxEntries) {
      throw new RangeError(`You cannot have more than ${this.maxEntries} entries in FieldList '${this.name}'`);
    }
    const entryIndex = index ?? this.lastIndex + 1;
    this.lastIndex = entryIndex;

    const field = this.meta.bindField(undefined, this.template, `${this.shortName}-${entryIndex}`, {
      prefix: this.prefix,
      id: `${this.id}-${entryIndex}`,
      meta: this.meta,
      translations: this.translations
    });
    field.process(formdata, data);
    this.entries.push(field);
    this.logger.verbose(`Added entry ${field.name}`);
    return field;
  }

  private boundedIndices(formdata: FormInput): number[] {
    const indices = [...new Set(this.extractIndices(formdata))].sort((a, b) => a - b);
    if (this.maxEntries === undefined || indices.length <= this.maxEntries) return indices;
    this.logger.debug(`Dropping indices ${indices.slice(this.maxEntries).join(", ")} of '${this.name}' past maxEntries`);
    return indices.slice(0, this.maxEntries);
  }

  private *extractIndices(formdata: FormInput): Generator<number> {
    const prefix = `${this.name}-`;
    for (const key of formdata.keys()) {
      if (!key.startsWith(prefix)) continue;
      const [segment = ""] = key.slice(prefix.length).split("-", 1);
      if (INDEX_SEGMENT.test(segment)) yield Number(segment);
    }
  }

  private itemsOf(value: unknown): Iterable<unknown> {
    if (value === null || value === undefined) return [];
    if (isIterable(value)) return value;
    throw new ConfigurationError(`FieldList '${this.name}' needs iterable data, got ${typeof value}`);
  }
}

import Decimal from "decimal.js";
import { ConfigurationError } from "@formwire/shared-types";
import type { NumberFormatSpec } from "@formwire/i18n";
import { z } from "zod";
import { Field, type FieldOptions } from "./base-field";
import { parseDecimalValue, parseFloatValue, parseInteger } from "./coercion";
import { checkOptions } from "./options";
import type { BindContext } from "./types";

export type IntegerFieldOptions = FieldOptions<number>;
export type FloatFieldOptions = FieldOptions<number>;

export interface DecimalFieldOptions extends FieldOptions<Decimal> {
  /** Digits kept when redisplaying. `null` shows the value unquantized. Defaults to 2. */
  places?: number | null;
  rounding?: Decimal.Rounding;
  useLocale?: boolean;
  numberFormat?: NumberFormatSpec;
}

const decimalOptionsSchema = z
  .object({
    places: z.number().int().min(0).nullable().optional(),
    rounding: z.number().int().min(0).max(8).optional(),
    useLocale: z.boolean().optional(),
    numberFormat: z.record(z.unknown()).optional()
  })
  .passthrough();

/**
 * Numeric kinds redisplay the submitted text when there is any, so a rejected value is
 * shown back as typed.
 */
abstract class NumberField<TData> extends Field<TData> {
  value(): string {
    const [raw] = this.rawData ?? [];
    if (raw !== undefined) return raw;
    return this.data === null ? "" : this.format(this.data);
  }

  protected format(data: TData): string {
    return String(data);
  }
}

export class IntegerField extends NumberField<number> {
  readonly type: string = "IntegerField";
  readonly inputType: string | undefined = "number";

  constructor(options: IntegerFieldOptions, context: BindContext) {
    super({ ...options, attributes: { step: "1", ...options.attributes } }, context);
  }

  protected fromObject(value: unknown): number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === "number" && Number.isInteger(value)) return value;
    return this.parseOrNull(() => parseInteger(String(value)));
  }

  protected fromWire(value: string): number {
    return this.parseOrReject(() => parseInteger(value), "Not a valid integer value");
  }
}

export class IntegerRangeField extends IntegerField {
  readonly type: string = "IntegerRangeField";
  readonly inputType: string | undefined = "range";
}

export class FloatField extends NumberField<number> {
  readonly type: string = "FloatField";
  readonly inputType: string | undefined = "text";

  protected fromObject(value: unknown): number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === "number") return value;
    return this.parseOrNull(() => parseFloatValue(String(value)));
  }

  protected fromWire(value: string): number {
    return this.parseOrReject(() => parseFloatValue(value), "Not a valid float value");
  }
}

/**
 * Decimal input backed by decimal.js. Either quantizes to `places` for redisplay or, with
 * `useLocale`, parses and formats through the meta's number locale for the first
 * configured locale.
 */
export class DecimalField extends NumberField<Decimal> {
  readonly type: string = "DecimalField";
  readonly inputType: string | undefined = "number";
  readonly places: number | null;
  readonly rounding: Decimal.Rounding;
  readonly useLocale: boolean;
  readonly numberFormat: NumberFormatSpec | null;
  readonly locale: string | undefined;

  constructor(options: DecimalFieldOptions, context: BindContext) {
    super({ ...options, attributes: { step: "any", ...options.attributes } }, context);
    checkOptions(decimalOptionsSchema, options, new.target.name);

    this.useLocale = options.useLocale ?? false;
    if (this.useLocale && (options.places !== undefined || options.rounding !== undefined)) {
      throw new ConfigurationError("When using locale-aware numbers, 'places' and 'rounding' are ignored.");
    }
    this.places = options.places === undefined ? 2 : options.places;
    this.rounding = options.rounding ?? Decimal.ROUND_HALF_EVEN;
    this.numberFormat = options.numberFormat ?? null;

    if (this.useLocale) {
      this.locale = this.meta.primaryLocale;
      if (!this.locale) {
        throw new ConfigurationError(`${new.target.name} '${this.name}' uses locale-aware numbers but meta has no locales`);
      }
    }
  }

  protected fromObject(value: unknown): Decimal | null {
    if (value === null || value === undefined) return null;
    if (Decimal.isDecimal(value)) return value;
    if (typeof value === "number") return new Decimal(value);
    return this.parseOrNull(() => parseDecimalValue(String(value)));
  }

  protected fromWire(value: string): Decimal {
    return this.parseOrReject(() => {
      if (this.useLocale && this.locale) return this.meta.numberLocale.parseDecimal(value, this.locale);
      return parseDecimalValue(value);
    }, "Not a valid decimal value");
  }

  protected format(data: Decimal): string {
    if (this.useLocale && this.locale) {
      return this.meta.numberLocale.formatDecimal(data, this.numberFormat, this.locale);
    }
    if (this.places === null || !data.isFinite()) return data.toString();
    return data.toFixed(this.places, this.rounding);
  }
}

export class DecimalRangeField extends DecimalField {
  readonly type: string = "DecimalRangeField";
  readonly inputType: string | undefined = "range";
}


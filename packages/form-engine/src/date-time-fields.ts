import { Field, type FieldOptions } from "./base-field";
import { formatDateTime, parseDateTime } from "./coercion";
import type { BindContext } from "./types";

export interface DateTimeFieldOptions extends FieldOptions<Date> {
  /** date-fns pattern used to parse and redisplay the value. */
  format?: string;
}

export const DATE_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const DATE_FORMAT = "yyyy-MM-dd";
export const TIME_FORMAT = "HH:mm";

function referenceDate(): Date {
  return new Date(1900, 0, 1);
}

/**
 * Several raw values are joined with a space before parsing, so a date and a time input
 * can share one field name.
 */
export class DateTimeField extends Field<Date> {
  readonly type: string = "DateTimeField";
  readonly inputType: string | undefined = "datetime";
  readonly format: string;
  protected readonly invalidMessage: string = "Not a valid datetime value";

  constructor(options: DateTimeFieldOptions, context: BindContext) {
    super(options, context);
    this.format = options.format ?? DATE_TIME_FORMAT;
  }

  processFormdata(values: readonly string[]): void {
    if (values.length === 0) return;
    this.data = this.fromWire(values.join(" "));
  }

  value(): string {
    if (this.rawData && this.rawData.length > 0) return this.rawData.join(" ");
    return this.data ? formatDateTime(this.data, this.format) : "";
  }

  protected fromObject(value: unknown): Date | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
    return this.parseOrNull(() => parseDateTime(String(value), this.format, referenceDate()));
  }

  protected fromWire(value: string): Date {
    return this.parseOrReject(() => parseDateTime(value, this.format, referenceDate()), this.invalidMessage);
  }
}

export class DateTimeLocalField extends DateTimeField {
  readonly type: string = "DateTimeLocalField";
  readonly inputType: string | undefined = "datetime-local";
}

export class DateField extends DateTimeField {
  readonly type: string = "DateField";
  readonly inputType: string | undefined = "date";
  protected readonly invalidMessage: string = "Not a valid date value";

  constructor(options: DateTimeFieldOptions, context: BindContext) {
    super({ ...options, format: options.format ?? DATE_FORMAT }, context);
  }
}

/**
 * Times are parsed onto 1900-01-01.
 */
export class TimeField extends DateTimeField {
  readonly type: string = "TimeField";
  readonly inputType: string | undefined = "time";
  protected readonly invalidMessage: string = "Not a valid time value";

  constructor(options: DateTimeFieldOptions, context: BindContext) {
    super({ ...options, format: options.format ?? TIME_FORMAT }, context);
  }
}

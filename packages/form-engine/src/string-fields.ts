import { Field, type FieldOptions } from "./base-field";
import type { BindContext } from "./types";

export type StringFieldOptions = FieldOptions<string>;

function textOf(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : String(value);
}

/**
 * Text input. A submitted form without this key yields an empty string, not null.
 */
export class StringField extends Field<string> {
  readonly type: string = "StringField";
  readonly inputType: string | undefined = "text";

  constructor(options: StringFieldOptions, context: BindContext) {
    super({ ...options, default: options.default ?? "" }, context);
  }

  processFormdata(values: readonly string[]): void {
    this.data = values[0] ?? "";
  }

  protected fromObject(value: unknown): string | null {
    return textOf(value);
  }

  protected fromWire(value: string): string {
    return value;
  }
}

export class TextAreaField extends StringField {
  readonly type: string = "TextAreaField";
  readonly inputType: string | undefined = undefined;
}

export class PasswordField extends StringField {
  readonly type: string = "PasswordField";
  readonly inputType: string | undefined = "password";

  value(): string {
    return "";
  }
}

export class HiddenField extends StringField {
  readonly type: string = "HiddenField";
  readonly inputType: string | undefined = "hidden";
}

export class SearchField extends StringField {
  readonly type: string = "SearchField";
  readonly inputType: string | undefined = "search";
}

export class TelField extends StringField {
  readonly type: string = "TelField";
  readonly inputType: string | undefined = "tel";
}

export class UrlField extends StringField {
  readonly type: string = "UrlField";
  readonly inputType: string | undefined = "url";
}

export class EmailField extends StringField {
  readonly type: string = "EmailField";
  readonly inputType: string | undefined = "email";
}

/**
 * Data is the submitted file name. The value is never rendered back.
 */
export class FileField extends Field<string> {
  readonly type: string = "FileField";
  readonly inputType: string | undefined = "file";

  value(): string {
    return "";
  }

  protected fromObject(value: unknown): string | null {
    return textOf(value);
  }

  protected fromWire(value: string): string {
    return value;
  }
}

export class MultipleFileField extends Field<readonly string[]> {
  readonly type: string = "MultipleFileField";
  readonly inputType: string | undefined = "file";

  constructor(options: FieldOptions<readonly string[]>, context: BindContext) {
    super({ ...options, attributes: { multiple: "multiple", ...options.attributes } }, context);
  }

  processFormdata(values: readonly string[]): void {
    this.data = [...values];
  }

  value(): string {
    return "";
  }

  protected fromObject(value: unknown): readonly string[] | null {
    if (value === null || value === undefined) return null;
    if (Array.isArray(value)) return value.map(String);
    return [String(value)];
  }

  protected fromWire(value: string): readonly string[] {
    return [value];
  }
}

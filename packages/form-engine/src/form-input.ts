import type { FormInput } from "@formwire/shared-types";

export type FormScalar = string | number | boolean;

export type FormRecord = Readonly<Record<string, FormScalar | readonly FormScalar[] | null | undefined>>;

/**
 * A multidict that exposes `getall` instead of `getAll`.
 */
export interface GetAllMultiDict {
  getall(key: string): readonly unknown[];
  keys(): Iterable<string>;
}

function toStrings(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.filter((item) => item !== null && item !== undefined).map(String);
  return [String(value)];
}

export class RecordFormInput implements FormInput {
  private readonly values = new Map<string, readonly string[]>();

  constructor(entries: Iterable<readonly [string, unknown]>) {
    for (const [key, value] of entries) {
      this.values.set(key, toStrings(value));
    }
  }

  static fromRecord(record: FormRecord): RecordFormInput {
    return new RecordFormInput(Object.entries(record));
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  getAll(key: string): readonly string[] {
    return this.values.get(key) ?? [];
  }

  keys(): Iterable<string> {
    return this.values.keys();
  }
}

export class MultiDictFormInput implements FormInput {
  constructor(private readonly source: GetAllMultiDict) {}

  has(key: string): boolean {
    return this.source.getall(key).length > 0;
  }

  getAll(key: string): readonly string[] {
    return toStrings(this.source.getall(key));
  }

  keys(): Iterable<string> {
    return this.source.keys();
  }
}

export function isGetAllMultiDict(value: unknown): value is GetAllMultiDict {
  return (
    typeof value === "object" &&
    value !== null &&
    "getall" in value &&
    typeof value.getall === "function" &&
    "keys" in value &&
    typeof value.keys === "function"
  );
}

export function isFormRecord(value: unknown): value is FormRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isFormRecordValue);
}

function isFormScalar(value: unknown): value is FormScalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function isFormRecordValue(value: unknown): boolean {
  if (value === null || value === undefined || isFormScalar(value)) return true;
  return Array.isArray(value) && value.every((item) => item === null || item === undefined || isFormScalar(item));
}

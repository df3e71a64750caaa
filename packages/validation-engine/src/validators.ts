import { isEmail, isIP, isMACAddress, isURL, isUUID } from "class-validator";
import { ConfigurationError } from "@formwire/shared-types";
import { interpolate, type MessageParams } from "./interpolate";
import { invalid, stop } from "./outcome";
import type { ValidationTarget, Validator } from "./types";

function translate(field: ValidationTarget, custom: string | undefined, fallback: string, params?: MessageParams) {
  return interpolate(custom ?? field.gettext(fallback), params);
}

function isFilled(data: unknown): boolean {
  if (data === null || data === undefined || data === false || data === 0) return false;
  if (typeof data === "number" && Number.isNaN(data)) return false;
  if (typeof data === "string") return data.trim().length > 0;
  if (Array.isArray(data)) return data.length > 0;
  return true;
}

function textOf(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === null || data === undefined) return "";
  return String(data);
}

function lengthOf(data: unknown): number {
  if (typeof data === "string" || Array.isArray(data)) return data.length;
  return 0;
}

function toNumber(data: unknown): number | null {
  if (typeof data === "number") return data;
  if (typeof data === "bigint") return Number(data);
  if (data && typeof data === "object" && "toNumber" in data && typeof data.toNumber === "function") {
    const result: unknown = data.toNumber();
    return typeof result === "number" ? result : null;
  }
  return null;
}

/**
 * Requires truthy data. Halts the chain and discards earlier errors, so a missing value
 * reports a single message.
 */
export function dataRequired(message?: string): Validator {
  return (_form, field) => {
    if (isFilled(field.data)) return;
    return stop(translate(field, message, "This field is required."), { clearErrors: true });
  };
}

/**
 * Requires that something was actually submitted, regardless of how it coerced.
 */
export function inputRequired(message?: string): Validator {
  return (_form, field) => {
    if (field.rawData?.[0]) return;
    return stop(translate(field, message, "This field is required."), { clearErrors: true });
  };
}

/**
 * Lets an empty submission through: halts the chain without a message and drops
 * coercion errors.
 */
export function optional(options: { stripWhitespace?: boolean } = {}): Validator {
  const stripWhitespace = options.stripWhitespace ?? true;
  return (_form, field) => {
    const first = field.rawData?.[0];
    const blank = first === undefined || (stripWhitespace ? first.trim() : first).length === 0;
    if (!blank) return;
    return stop(undefined, { clearErrors: true });
  };
}

export function length(options: { min?: number; max?: number; message?: string }): Validator {
  const min = options.min ?? -1;
  const max = options.max ?? -1;
  if (min === -1 && max === -1) {
    throw new ConfigurationError("length() needs at least one of `min` or `max`");
  }
  if (max !== -1 && min > max) {
    throw new ConfigurationError("length() `min` cannot be greater than `max`");
  }

  return (_form, field) => {
    const size = lengthOf(field.data);
    if (size >= min && (max === -1 || size <= max)) return;

    const params = { min, max, length: size };
    if (options.message) return invalid(interpolate(options.message, params));
    if (max === -1) {
      return invalid(
        interpolate(
          field.ngettext("Field must be at least {min} character long.", "Field must be at least {min} characters long.", min),
          params
        )
      );
    }
    if (min === -1) {
      return invalid(
        interpolate(
          field.ngettext("Field cannot be longer than {max} character.", "Field cannot be longer than {max} characters.", max),
          params
        )
      );
    }
    if (min === max) {
      return invalid(
        interpolate(
          field.ngettext("Field must be exactly {max} character long.", "Field must be exactly {max} characters long.", max),
          params
        )
      );
    }
    return invalid(interpolate(field.gettext("Field must be between {min} and {max} characters long."), params));
  };
}

export function numberRange(options: { min?: number; max?: number; message?: string }): Validator {
  const { min, max } = options;
  return (_form, field) => {
    const value = toNumber(field.data);
    if (value !== null && !Number.isNaN(value)) {
      if ((min === undefined || value >= min) && (max === undefined || value <= max)) return;
    }

    const params = { min: min ?? "", max: max ?? "" };
    if (min !== undefined && max !== undefined) {
      return invalid(translate(field, options.message, "Number must be between {min} and {max}.", params));
    }
    if (min !== undefined) return invalid(translate(field, options.message, "Number must be at least {min}.", params));
    return invalid(translate(field, options.message, "Number must be at most {max}.", params));
  };
}

export function equalTo(fieldName: string, message?: string): Validator {
  return (form, field) => {
    const other = form?.getField(fieldName);
    if (!other) {
      return invalid(interpolate(field.gettext("Invalid field name '{name}'."), { name: fieldName }));
    }
    if (field.data === other.data) return;
    return invalid(
      translate(field, message, "Field must be equal to {otherName}.", { otherName: fieldName, otherLabel: other.label })
    );
  };
}

/**
 * Matches at the start of the data, like an anchored search.
 */
export function regexp(pattern: string | RegExp, options: { flags?: string; message?: string } = {}): Validator {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const baseFlags = options.flags ?? (typeof pattern === "string" ? "" : pattern.flags);
  const sticky = new RegExp(source, baseFlags.replace(/[gy]/g, "") + "y");

  return (_form, field) => {
    sticky.lastIndex = 0;
    if (sticky.test(textOf(field.data))) return;
    return invalid(translate(field, options.message, "Invalid input."));
  };
}

export function email(message?: string): Validator {
  return (_form, field) => {
    if (isEmail(textOf(field.data))) return;
    return invalid(translate(field, message, "Invalid email address."));
  };
}

export function url(options: { requireTld?: boolean; message?: string } = {}): Validator {
  const requireTld = options.requireTld ?? true;
  return (_form, field) => {
    if (isURL(textOf(field.data), { require_tld: requireTld, require_protocol: true })) return;
    return invalid(translate(field, options.message, "Invalid URL."));
  };
}

export function uuid(message?: string): Validator {
  return (_form, field) => {
    if (isUUID(textOf(field.data))) return;
    return invalid(translate(field, message, "Invalid UUID."));
  };
}

export function ipAddress(options: { ipv4?: boolean; ipv6?: boolean; message?: string } = {}): Validator {
  const ipv4 = options.ipv4 ?? true;
  const ipv6 = options.ipv6 ?? false;
  if (!ipv4 && !ipv6) {
    throw new ConfigurationError("ipAddress() cannot have both `ipv4` and `ipv6` disabled");
  }

  return (_form, field) => {
    const value = textOf(field.data);
    if ((ipv4 && isIP(value, 4)) || (ipv6 && isIP(value, 6))) return;
    return invalid(translate(field, options.message, "Invalid IP address."));
  };
}

export function macAddress(message?: string): Validator {
  return (_form, field) => {
    if (isMACAddress(textOf(field.data))) return;
    return invalid(translate(field, message, "Invalid Mac address."));
  };
}

export function anyOf(values: readonly unknown[], message?: string): Validator {
  const listing = values.map(String).join(", ");
  return (_form, field) => {
    if (values.includes(field.data)) return;
    return invalid(translate(field, message, "Invalid value, must be one of: {values}.", { values: listing }));
  };
}

export function noneOf(values: readonly unknown[], message?: string): Validator {
  const listing = values.map(String).join(", ");
  return (_form, field) => {
    if (!values.includes(field.data)) return;
    return invalid(translate(field, message, "Invalid value, can't be any of: {values}.", { values: listing }));
  };
}

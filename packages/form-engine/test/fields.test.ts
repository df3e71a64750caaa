import Decimal from "decimal.js";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, ValueError } from "@formwire/shared-types";
import { dataRequired, invalid, stop, type Validator } from "@formwire/validation-engine";
import {
  booleanField,
  dateField,
  dateTimeField,
  decimalField,
  floatField,
  integerField,
  multipleFileField,
  passwordField,
  selectField,
  selectMultipleField,
  stringField,
  submitField,
  timeField,
  coerceInteger,
  StringField,
  UnboundField,
  type FormContext,
  type PreValidateResult
} from "../src";
import { bindAlone, testMeta, wire } from "./helpers";

describe("field binding", () => {
  it("derives name, id and label from the bind context", () => {
    const field = stringField().bind(undefined, "first_name", { meta: testMeta(), prefix: "user-" });

    expect(field.shortName).toBe("first_name");
    expect(field.name).toBe("user-first_name");
    expect(field.id).toBe("user-first_name");
    expect(field.label).toBe("First Name");
    expect(field.attributes).toEqual({ id: "user-first_name", name: "user-first_name", type: "text" });
  });

  it("keeps a declared id unless the binder supplies one", () => {
    expect(bindAlone(stringField({ id: "custom" }), "title").id).toBe("custom");
    expect(stringField({ id: "custom" }).bind(undefined, "title", { meta: testMeta(), id: "given" }).id).toBe("given");
  });

  it("lets bind overrides win over declared options", () => {
    const declaration = stringField({ label: "Declared" });
    const field = declaration.bind(undefined, "title", { meta: testMeta(), overrides: { label: "Override" } });

    expect(field.label).toBe("Override");
    expect(field.creationCounter).toBe(declaration.creationCounter);
  });

  it("refuses to bind without a form or a meta", () => {
    expect(() => stringField().bind(undefined, "title")).toThrow(ConfigurationError);
  });

  it("rejects malformed options", () => {
    expect(() => bindAlone(stringField({ id: "" }), "title")).toThrow(ConfigurationError);
  });
});

describe("field processing", () => {
  it("lets formdata take precedence over object data", () => {
    const field = bindAlone(stringField(), "title");
    field.process(wire("title=From+wire"), "From object");

    expect(field.data).toBe("From wire");
    expect(field.objectData).toBe("From object");
    expect(field.rawData).toEqual(["From wire"]);
  });

  it("uses the default when no object data is given", () => {
    const field = bindAlone(stringField({ default: () => "fallback" }), "title");
    field.process(undefined);

    expect(field.data).toBe("fallback");
    expect(field.rawData).toBeUndefined();
  });

  it("reads an absent key as an empty string once formdata is present", () => {
    const field = bindAlone(stringField(), "title");
    field.process(wire("other=1"), "kept?");

    expect(field.rawData).toEqual([]);
    expect(field.data).toBe("");
  });

  it("runs filters in order and records a failing filter", () => {
    const trimmed = bindAlone(stringField({ filters: [(value) => value?.trim() ?? null, (value) => value?.toUpperCase() ?? null] }), "code");
    trimmed.process(wire("code=++ab++"));
    expect(trimmed.data).toBe("AB");

    const failing = bindAlone(
      stringField({
        filters: [
          () => {
            throw new ValueError("Filter rejected the value");
          }
        ]
      }),
      "code"
    );
    failing.process(wire("code=ab"));
    expect(failing.processErrors).toEqual(["Filter rejected the value"]);
  });

  it("writes data onto the target object", () => {
    const field = bindAlone(stringField(), "title");
    field.process(wire("title=Hello"));
    const target = { title: "old" };
    field.populateObj(target, "title");

    expect(target.title).toBe("Hello");
  });
});

describe("validation", () => {
  it("keeps collecting after a non-halting failure and stops at a halting one", () => {
    const skipped = vi.fn<Validator>();
    const field = bindAlone(
      stringField({
        validators: [() => invalid("first problem"), () => stop("second problem"), skipped]
      }),
      "title"
    );
    field.process(wire("title=x"));

    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["first problem", "second problem"]);
    expect(skipped).not.toHaveBeenCalled();
  });

  it("skips the chain when preValidate halts and still runs postValidate last", () => {
    class LockedField extends StringField {
      readonly stoppedFlags: boolean[] = [];

      preValidate(): PreValidateResult {
        return this.data === "locked" ? stop("Field is locked") : undefined;
      }

      postValidate(_form: FormContext | undefined, stopped: boolean): PreValidateResult {
        this.stoppedFlags.push(stopped);
        return invalid("Checked after the chain");
      }
    }
    const chained = vi.fn<Validator>();
    const field = bindAlone(new UnboundField(LockedField, { validators: [chained] }), "title");

    field.process(wire("title=locked"));
    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["Field is locked", "Checked after the chain"]);
    expect(field.stoppedFlags).toEqual([true]);
    expect(chained).not.toHaveBeenCalled();

    field.process(wire("title=open"));
    field.validate();
    expect(field.errors).toEqual(["Checked after the chain"]);
    expect(field.stoppedFlags).toEqual([true, false]);
    expect(chained).toHaveBeenCalledTimes(1);
  });

  it("runs extra validators after the field's own", () => {
    const field = bindAlone(stringField({ validators: [() => invalid("own")] }), "title");
    field.process(wire("title=x"));

    field.validate(undefined, [() => invalid("extra")]);
    expect(field.errors).toEqual(["own", "extra"]);
  });

  it("rebuilds errors from scratch on every call", () => {
    const field = bindAlone(stringField({ validators: [dataRequired()] }), "title");
    field.process(wire(""));

    expect(field.validate()).toBe(false);
    const first = [...field.errors];
    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(first);
    expect(field.errors).toEqual(["This field is required."]);
  });

  it("seeds errors with process errors", () => {
    const field = bindAlone(integerField({ validators: [() => invalid("chain ran")] }), "age");
    field.process(wire("age=abc"));

    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["Not a valid integer value", "chain ran"]);
  });
});

describe("boolean fields", () => {
  it("treats absence and false markers as unchecked", () => {
    const field = bindAlone(booleanField(), "agree");

    field.processFormdata([]);
    expect(field.data).toBe(false);
    field.processFormdata(["false"]);
    expect(field.data).toBe(false);
    field.processFormdata([""]);
    expect(field.data).toBe(false);
    field.processFormdata(["anything-else"]);
    expect(field.data).toBe(true);
  });

  it("reads a missing key as unchecked even when the object says otherwise", () => {
    const field = bindAlone(booleanField(), "agree");
    field.process(wire("other=1"), true);

    expect(field.data).toBe(false);
  });

  it("uses truthiness for object data and honours custom false values", () => {
    const field = bindAlone(booleanField({ falseValues: ["no"] }), "agree");

    field.process(undefined, "yes");
    expect(field.data).toBe(true);
    field.process(undefined);
    expect(field.data).toBe(false);
    field.process(wire("agree=no"));
    expect(field.data).toBe(false);
    field.process(wire("agree=false"));
    expect(field.data).toBe(true);
    expect(field.value()).toBe("false");
  });

  it("gives submit buttons checkbox semantics", () => {
    const field = bindAlone(submitField(), "save");
    field.process(wire("save=Save"));

    expect(field.data).toBe(true);
    expect(field.attributes.type).toBe("submit");
  });
});

describe("numeric fields", () => {
  it("parses integers", () => {
    const field = bindAlone(integerField(), "age");
    field.process(wire("age=42"));

    expect(field.data).toBe(42);
    expect(field.processErrors).toEqual([]);
  });

  it("keeps invalid integer input for redisplay", () => {
    const field = bindAlone(integerField(), "age");
    field.process(wire("age=abc"), 30);

    expect(field.data).toBeNull();
    expect(field.processErrors).toEqual(["Not a valid integer value"]);
    expect(field.value()).toBe("abc");
  });

  it("drops object data that does not parse without recording an error", () => {
    const field = bindAlone(integerField(), "age");
    field.process(undefined, 3.5);

    expect(field.data).toBeNull();
    expect(field.processErrors).toEqual([]);
  });

  it("lets valid formdata win over object data that does not parse", () => {
    const age = bindAlone(integerField(), "age");
    age.process(wire("age=4"), 3.5);
    expect(age.data).toBe(4);
    expect(age.validate()).toBe(true);

    const price = bindAlone(decimalField(), "price");
    price.process(wire("price=2.5"), "not a number");
    expect(price.data?.toString()).toBe("2.5");
    expect(price.validate()).toBe(true);
  });

  it("formats object data when nothing was submitted", () => {
    const field = bindAlone(floatField(), "ratio");
    field.process(undefined, 0.25);

    expect(field.value()).toBe("0.25");
  });

  it("quantizes decimals to two places by default", () => {
    const field = bindAlone(decimalField(), "price");
    field.process(undefined, new Decimal("3.1"));

    expect(field.value()).toBe("3.10");
  });

  it("rounds half to even unless told otherwise", () => {
    const even = bindAlone(decimalField({ places: 2 }), "price");
    even.process(undefined, new Decimal("2.345"));
    expect(even.value()).toBe("2.34");

    const up = bindAlone(decimalField({ places: 2, rounding: Decimal.ROUND_HALF_UP }), "price");
    up.process(undefined, new Decimal("2.345"));
    expect(up.value()).toBe("2.35");

    const raw = bindAlone(decimalField({ places: null }), "price");
    raw.process(undefined, new Decimal("2.345"));
    expect(raw.value()).toBe("2.345");
  });

  it("rejects malformed decimals", () => {
    const field = bindAlone(decimalField(), "price");
    field.process(wire("price=12..5"));

    expect(field.data).toBeNull();
    expect(field.processErrors).toEqual(["Not a valid decimal value"]);
  });

  it("parses and formats through the meta's number locale", () => {
    const meta = testMeta({ locales: ["de-DE"] });
    const field = bindAlone(decimalField({ useLocale: true }), "price", meta);

    field.process(wire("price=1.234,5"));
    expect(field.data?.toString()).toBe("1234.5");

    const display = bindAlone(decimalField({ useLocale: true }), "price", meta);
    display.process(undefined, new Decimal("9876.5"));
    expect(display.value()).toBe("9.876,5");
  });

  it("refuses places together with locale-aware numbers", () => {
    const meta = testMeta({ locales: ["de-DE"] });

    expect(() => bindAlone(decimalField({ useLocale: true, places: 2 }), "price", meta)).toThrow(ConfigurationError);
    expect(() => bindAlone(decimalField({ useLocale: true }), "price")).toThrow(ConfigurationError);
  });
});

describe("date and time fields", () => {
  it("parses dates", () => {
    const field = bindAlone(dateField(), "when");
    field.process(wire("when=2024-03-05"));

    expect(field.data?.getFullYear()).toBe(2024);
    expect(field.data?.getMonth()).toBe(2);
    expect(field.data?.getDate()).toBe(5);
  });

  it("joins split inputs before parsing", () => {
    const field = bindAlone(dateTimeField(), "at");
    field.process(wire("at=2024-03-05&at=10:15:00"));

    expect(field.processErrors).toEqual([]);
    expect(field.data?.getHours()).toBe(10);
    expect(field.data?.getMinutes()).toBe(15);
    expect(field.value()).toBe("2024-03-05 10:15:00");
  });

  it("parses times onto the reference date", () => {
    const field = bindAlone(timeField(), "at");
    field.process(wire("at=09:30"));

    expect(field.data?.getFullYear()).toBe(1900);
    expect(field.data?.getHours()).toBe(9);
    expect(field.data?.getMinutes()).toBe(30);
  });

  it("keeps the raw tokens when parsing fails", () => {
    const field = bindAlone(dateField(), "when");
    field.process(wire("when=2024-13-01"));

    expect(field.data).toBeNull();
    expect(field.processErrors).toEqual(["Not a valid date value"]);
    expect(field.value()).toBe("2024-13-01");
  });

  it("lets valid formdata win over an object value in another format", () => {
    const field = bindAlone(dateTimeField(), "at");
    field.process(wire("at=2024-03-05+10:15:00"), "2024-03-05T10:15:00Z");

    expect(field.validate()).toBe(true);
    expect(field.errors).toEqual([]);
    expect(field.data?.getHours()).toBe(10);
  });

  it("formats object data with the field's pattern", () => {
    const field = bindAlone(dateField({ format: "dd.MM.yyyy" }), "when");
    field.process(undefined, new Date(2024, 0, 9));

    expect(field.value()).toBe("09.01.2024");
  });
});

describe("select fields", () => {
  const choices = [
    ["1", "One"],
    ["2", "Two"]
  ] as const;

  it("accepts a coerced member of the choices", () => {
    const field = bindAlone(selectField({ choices, coerce: coerceInteger }), "pick");
    field.process(wire("pick=2"));

    expect(field.data).toBe(2);
    expect(field.validate()).toBe(true);
    expect([...field.iterChoices()]).toEqual([
      { value: "1", label: "One", selected: false },
      { value: "2", label: "Two", selected: true }
    ]);
  });

  it("rejects values outside the choices", () => {
    const field = bindAlone(selectField({ choices, coerce: coerceInteger }), "pick");
    field.process(wire("pick=9"));

    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["Not a valid choice"]);
  });

  it("keeps the previous data when the submitted value cannot be coerced", () => {
    const field = bindAlone(selectField({ choices, coerce: coerceInteger }), "pick");
    field.process(wire("pick=abc"), 2);

    expect(field.data).toBe(2);
    expect(field.processErrors).toEqual(["Invalid Choice: could not coerce"]);
    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["Invalid Choice: could not coerce"]);
  });

  it("nulls object data that cannot be coerced", () => {
    const field = bindAlone(selectField({ choices, coerce: coerceInteger }), "pick");
    field.process(undefined, "abc");

    expect(field.data).toBeNull();
    expect(field.processErrors).toEqual([]);
  });

  it("coerces to strings by default", () => {
    const field = bindAlone(selectField({ choices: [["a", "A"]] }), "pick");
    field.process(wire("pick=b"));

    expect(field.data).toBe("b");
    expect(field.validate()).toBe(false);
  });

  it("copies the choices given at declaration", () => {
    const declared: Array<readonly [string, string]> = [["a", "A"]];
    const field = bindAlone(selectField({ choices: declared }), "pick");
    declared.push(["b", "B"]);

    expect(field.choices).toEqual([["a", "A"]]);
  });

  it("reports every value outside the choices of a multi-select", () => {
    const field = bindAlone(
      selectMultipleField({ choices: [["1", "One"], ["2", "Two"], ["3", "Three"]], coerce: coerceInteger }),
      "tags"
    );
    field.process(wire("tags=1&tags=5&tags=3&tags=7"));

    expect(field.data).toEqual([1, 5, 3, 7]);
    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual([
      "'5' is not a valid choice for this field",
      "'7' is not a valid choice for this field"
    ]);
  });

  it("rejects a whole multi-select submission when one value cannot be coerced", () => {
    const field = bindAlone(selectMultipleField({ choices: [["1", "One"]], coerce: coerceInteger }), "tags");
    field.process(wire("tags=1&tags=x"));

    expect(field.data).toBeNull();
    expect(field.validate()).toBe(false);
    expect(field.errors).toEqual(["Invalid choice(s): one or more data inputs could not be coerced"]);
  });
});

describe("other input kinds", () => {
  it("never redisplays a password", () => {
    const field = bindAlone(passwordField(), "secret");
    field.process(wire("secret=test-secret"));

    expect(field.data).toBe("test-secret");
    expect(field.value()).toBe("");
  });

  it("collects every submitted file name", () => {
    const field = bindAlone(multipleFileField(), "uploads");
    field.process(wire("uploads=a.txt&uploads=b.txt"));

    expect(field.data).toEqual(["a.txt", "b.txt"]);
    expect(field.attributes.multiple).toBe("multiple");
  });
});

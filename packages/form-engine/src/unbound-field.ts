import type { BindContext, BindOptions, BoundField, FieldDeclaration, FormContext } from "./types";

export type FieldClass<F extends BoundField, O extends object> = new (options: O, context: BindContext) => F;

/**
 * Form-level declaration of a field. Holds the field class and its options and produces
 * a fresh bound field for every form instance that binds it.
 */
export class UnboundField<F extends BoundField, O extends object> implements FieldDeclaration<F> {
  private static counter = 0;

  readonly creationCounter: number;
  readonly options: O;

  constructor(
    readonly fieldClass: FieldClass<F, O>,
    options: O
  ) {
    UnboundField.counter += 1;
    this.creationCounter = UnboundField.counter;
    const copy = { ...options };
    Object.freeze(copy);
    this.options = copy;
    Object.freeze(this);
  }

  get fieldType(): string {
    return this.fieldClass.name;
  }

  bind(form: FormContext | undefined, name: string, options: BindOptions & { overrides?: Partial<O> } = {}): F {
    const { overrides, ...context } = options;
    return new this.fieldClass(
      { ...this.options, ...overrides },
      { ...context, form, name, creationCounter: this.creationCounter }
    );
  }

  toString(): string {
    return `<UnboundField(${this.fieldType})>`;
  }
}

export function isUnboundField(value: unknown): value is UnboundField<BoundField, object> {
  return value instanceof UnboundField;
}

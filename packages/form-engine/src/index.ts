export * from "./types";
export * from "./coercion";
export * from "./form-input";
export { FormMeta, type FormMetaOptions } from "./meta";
export { UnboundField, isUnboundField, type FieldClass } from "./unbound-field";
export { BaseField, Field, type BaseFieldOptions, type FieldOptions, type PreValidateResult } from "./base-field";
export * from "./string-fields";
export * from "./numeric-fields";
export * from "./boolean-field";
export * from "./date-time-fields";
export * from "./choice-fields";
export { FormField, type FormFieldOptions } from "./form-field";
export { FieldList, type FieldListOptions } from "./field-list";
export {
  defineForm,
  Form,
  FormDefinition,
  type FieldValidators,
  type FormCreateOptions,
  type FormDefinitionOptions,
  type FormSchema
} from "./form";
export * from "./declare";

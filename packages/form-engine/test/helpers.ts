import { TranslationCache } from "@formwire/i18n";
import { FormMeta, type BoundField, type FieldDeclaration, type FormMetaOptions } from "../src";

export function testMeta(options: Partial<FormMetaOptions> = {}): FormMeta {
  return new FormMeta({ translationCache: new TranslationCache(), ...options });
}

export function bindAlone<F extends BoundField>(declaration: FieldDeclaration<F>, name: string, meta = testMeta()): F {
  return declaration.bind(undefined, name, { meta });
}

export function wire(query: string): URLSearchParams {
  return new URLSearchParams(query);
}

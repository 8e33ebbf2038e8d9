import { MetadataFieldCollisionError } from "../../core/errors";

interface MetadataHolder {
  metadata: object;
}

const installed = new WeakSet<object>();

/**
 * Names a class already uses: every own property along the prototype chain
 * of `target`, `Object.prototype` included, plus the declared instance fields.
 */
function builtinNames(target: object, instanceFields: readonly string[]): Set<string> {
  const names = new Set(instanceFields);
  let proto: object | null = target;
  while (proto !== null) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      names.add(name);
    }
    proto = Object.getPrototypeOf(proto);
  }
  return names;
}

/**
 * Define a get/set property on `target` for each of `fields`, forwarding to
 * `this.metadata[field]`.
 *
 * Idempotent per target. All fields are checked before anything is defined:
 * a field that matches an existing member or one of `instanceFields` throws
 * {@link MetadataFieldCollisionError} and leaves `target` untouched.
 */
export function installMetadataAccessors(
  target: object,
  fields: readonly string[],
  instanceFields: readonly string[] = []
): void {
  if (installed.has(target)) {
    return;
  }

  const taken = builtinNames(target, instanceFields);
  for (const field of fields) {
    if (taken.has(field)) {
      throw new MetadataFieldCollisionError(field);
    }
  }

  for (const field of fields) {
    Object.defineProperty(target, field, {
      configurable: true,
      enumerable: false,
      get(this: MetadataHolder): unknown {
        return Reflect.get(this.metadata, field);
      },
      set(this: MetadataHolder, value: unknown) {
        Reflect.set(this.metadata, field, value);
      },
    });
  }
  installed.add(target);
}

export function hasMetadataAccessors(target: object): boolean {
  return installed.has(target);
}

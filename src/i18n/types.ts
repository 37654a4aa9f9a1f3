/**
 * Type definitions for the i18n layer.
 */

// Available translation namespaces
export type TranslationNamespace = 'common' | 'commands' | 'errors';

/**
 * Extracts all valid dot-notation paths from a nested object type.
 *
 * @example
 * ```typescript
 * type Keys = NestedKeyOf<{ a: { b: string; c: { d: string } } }>
 * // Result: "a" | "a.b" | "a.c" | "a.c.d"
 * ```
 */
export type NestedKeyOf<T> = T extends object
  ? {
      [K in keyof T & string]: T[K] extends object
        ? K | `${K}.${NestedKeyOf<T[K]>}`
        : K;
    }[keyof T & string]
  : never;

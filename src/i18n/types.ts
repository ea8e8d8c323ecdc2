// Translation namespace types for type-safe i18n

// Supported languages
export type SupportedLanguage = "en";

// Available translation namespaces
export type TranslationNamespace = "common" | "commands" | "errors";

/**
 * Recursively generates dot-notation paths for nested objects.
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

/**
 * Extracts the type at a given dot-notation path.
 *
 * @example
 * ```typescript
 * type Value = PathValue<{ a: { b: string } }, "a.b"> // string
 * ```
 */
export type PathValue<T, P extends string> = P extends `${infer K}.${infer Rest}`
  ? K extends keyof T
    ? PathValue<T[K], Rest>
    : never
  : P extends keyof T
    ? T[P]
    : never;

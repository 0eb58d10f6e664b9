/**
 * Branding utilities for type-safe nominal typing.
 *
 * Brands create distinct types from primitives without runtime overhead.
 */

declare const SoftBrandTag: unique symbol;

/**
 * SoftBrand<U, Name> - A branded type that allows naked U as assignable.
 *
 * @example
 * type InterfaceName = SoftBrand<string, 'interface-name'>;
 * const name: InterfaceName = "demo.Calc";  // ✅ string assignable to InterfaceName
 *
 * type BlueprintName = SoftBrand<string, 'blueprint-name'>;
 * const bp: BlueprintName = name;           // ❌ InterfaceName not assignable to BlueprintName
 */
export type SoftBrand<U, Name extends string> = U & { [SoftBrandTag]?: Name };

/** Id<Name> - Convenience wrapper for soft-branded string identifiers. */
export type Id<Name extends string> = SoftBrand<string, Name>;

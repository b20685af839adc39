/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const SourceNameBrand: unique symbol
declare const ContentHashBrand: unique symbol
declare const SemverBrand: unique symbol
declare const RelativePathBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/** Name of a subscription or provider; the qualifier in `source/app`. */
export type SourceName = Brand<string, typeof SourceNameBrand>

/** Lowercase hex sha256 digest (64 chars). */
export type ContentHash = Brand<string, typeof ContentHashBrand>

/** A version string that semver accepts, stored in its cleaned form. */
export type Semver = Brand<string, typeof SemverBrand>

/** Forward-slash relative path with no `..` segments and no leading slash. */
export type RelativePath = Brand<string, typeof RelativePathBrand>

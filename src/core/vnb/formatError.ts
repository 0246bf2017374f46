// src/core/vnb/formatError.ts

/**
 * Failure categories raised by the VNB codec.
 *
 * - `TruncatedInput`: the stream ended before a length implied by counts or
 *   flags already read.
 * - `LegacyParseFailure`: the legacy grammar ran out of bytes or read an
 *   implausible count.
 * - `InvariantViolation`: the in-memory data disagrees with its own flags or
 *   counts (encode), or a consumer found an out-of-range reference.
 * - `StringTooLong`: a UTF-8 payload does not fit its 16-bit length prefix.
 * - `UnknownEnumValue`: an enum byte outside its defined range.
 * - `UnresolvedTexture`: an external texture the resolver could not supply,
 *   under the `reject` policy.
 * - `UnsupportedMagicOrVersion`: the header is not the current format and
 *   legacy fallback is disabled. With fallback enabled a mismatch is routed
 *   to the legacy parser and never raised.
 */
export type FormatErrorKind =
  | "TruncatedInput"
  | "LegacyParseFailure"
  | "InvariantViolation"
  | "StringTooLong"
  | "UnknownEnumValue"
  | "UnresolvedTexture"
  | "UnsupportedMagicOrVersion";

export class FormatError extends Error {
  public readonly kind: FormatErrorKind;

  constructor(kind: FormatErrorKind, message: string, options?: ErrorOptions) {
    super(`${kind}: ${message}`, options);
    this.name = "FormatError";
    this.kind = kind;
  }
}

/**
 * Narrows an unknown thrown value to a FormatError of the given kind.
 */
export function isFormatError(
  error: unknown,
  kind?: FormatErrorKind,
): error is FormatError {
  return (
    error instanceof FormatError && (kind === undefined || error.kind === kind)
  );
}

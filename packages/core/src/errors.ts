/**
 * Error taxonomy for the SysEx codec.
 *
 * Protocol errors are returned inside a `Result`, never thrown. Programming
 * errors (a codec value wider than its field, an address offset that leaves
 * the 7-bit range) throw, since no caller can recover from them.
 */

// =============================================================================
// Result
// =============================================================================

export type Result<T, E extends Error = SysExError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

// =============================================================================
// Protocol Errors
// =============================================================================

export type SysExErrorCode =
  | 'HEADER_MISMATCH'
  | 'TRUNCATED_MESSAGE'
  | 'CHECKSUM_MISMATCH'
  | 'UNKNOWN_PARAMETER'
  | 'VALUE_OUT_OF_RANGE'
  | 'ADDRESS_RESOLUTION'

export abstract class SysExError extends Error {
  abstract readonly code: SysExErrorCode
}

/**
 * Wrong framing, manufacturer, device, model or command byte.
 */
export class HeaderMismatchError extends SysExError {
  readonly code = 'HEADER_MISMATCH'

  constructor(
    public readonly field: string,
    public readonly expected: number,
    public readonly actual: number | undefined,
    public readonly position: number
  ) {
    super(
      `Header mismatch at byte ${position} (${field}): expected 0x${hex(expected)}, ` +
      `got ${actual === undefined ? 'nothing' : `0x${hex(actual)}`}`
    )
    this.name = 'HeaderMismatchError'
  }
}

export class TruncatedMessageError extends SysExError {
  readonly code = 'TRUNCATED_MESSAGE'

  constructor(
    public readonly length: number,
    public readonly minimumLength: number
  ) {
    super(`Message of ${length} bytes is shorter than the ${minimumLength}-byte minimum frame`)
    this.name = 'TruncatedMessageError'
  }
}

export class ChecksumMismatchError extends SysExError {
  readonly code = 'CHECKSUM_MISMATCH'

  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Checksum mismatch: expected 0x${hex(expected)}, got 0x${hex(actual)}`)
    this.name = 'ChecksumMismatchError'
  }
}

export class UnknownParameterError extends SysExError {
  readonly code = 'UNKNOWN_PARAMETER'

  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(message)
    this.name = 'UnknownParameterError'
  }
}

export class ValueOutOfRangeError extends SysExError {
  readonly code = 'VALUE_OUT_OF_RANGE'

  constructor(
    public readonly parameter: string,
    public readonly value: number,
    public readonly displayMin: number,
    public readonly displayMax: number
  ) {
    super(`Value ${value} for ${parameter} cannot be placed in ${displayMin}..${displayMax}`)
    this.name = 'ValueOutOfRangeError'
  }
}

export class AddressResolutionError extends SysExError {
  readonly code = 'ADDRESS_RESOLUTION'

  constructor(
    public readonly family: string,
    message: string
  ) {
    super(message)
    this.name = 'AddressResolutionError'
  }
}

export type ComposeError = UnknownParameterError | ValueOutOfRangeError | AddressResolutionError
export type ParseError = HeaderMismatchError | TruncatedMessageError | ChecksumMismatchError

// =============================================================================
// Programming Errors
// =============================================================================

/**
 * A codec input does not fit the declared bit width.
 */
export class BitWidthError extends RangeError {
  constructor(
    public readonly value: number,
    public readonly bits: number
  ) {
    super(`Value ${value} is not an unsigned ${bits}-bit integer`)
    this.name = 'BitWidthError'
  }
}

/**
 * An address component left 0x00..0x7F.
 */
export class AddressOverflowError extends RangeError {
  constructor(
    public readonly component: 'msb' | 'umb' | 'lmb' | 'lsb',
    public readonly value: number
  ) {
    super(`Address component ${component} out of range: ${value}`)
    this.name = 'AddressOverflowError'
  }
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0')
}

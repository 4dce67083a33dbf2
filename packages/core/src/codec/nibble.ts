/**
 * 7-bit-safe byte packing.
 *
 * SysEx data bytes must stay within 0x00-0x7F. Wider values travel either as
 * 4-bit nibbles (one per data byte) or as 7-bit groups.
 */

import { BitWidthError } from '../errors'

// =============================================================================
// Helpers
// =============================================================================

function assertWidth(value: number, bits: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 2 ** bits - 1) {
    throw new BitWidthError(value, bits)
  }
}

function assertNibbles(nibbles: readonly number[], count: number): void {
  if (nibbles.length !== count) {
    throw new RangeError(`Expected ${count} nibbles, got ${nibbles.length}`)
  }
  for (const nibble of nibbles) assertWidth(nibble, 4)
}

function splitNibbles(value: number, count: number): number[] {
  const nibbles: number[] = []
  for (let i = count - 1; i >= 0; i--) {
    // Bitwise shifts are signed 32-bit, so divide instead
    nibbles.push(Math.floor(value / 16 ** i) % 16)
  }
  return nibbles
}

function joinNibbles(nibbles: readonly number[]): number {
  return nibbles.reduce((acc, nibble) => acc * 16 + nibble, 0)
}

// =============================================================================
// Nibbles
// =============================================================================

export function split8BitToNibbles(value: number): [number, number] {
  assertWidth(value, 8)
  return [value >> 4, value & 0x0f]
}

export function joinNibblesTo8Bit(nibbles: readonly number[]): number {
  assertNibbles(nibbles, 2)
  return joinNibbles(nibbles)
}

/** MSB first. */
export function split16BitToNibbles(value: number): number[] {
  assertWidth(value, 16)
  return splitNibbles(value, 4)
}

export function joinNibblesTo16Bit(nibbles: readonly number[]): number {
  assertNibbles(nibbles, 4)
  return joinNibbles(nibbles)
}

/** MSB first. */
export function split32BitToNibbles(value: number): number[] {
  assertWidth(value, 32)
  return splitNibbles(value, 8)
}

export function joinNibblesTo32Bit(nibbles: readonly number[]): number {
  assertNibbles(nibbles, 8)
  return joinNibbles(nibbles)
}

/**
 * Split every byte above 0x7F into its two nibbles; smaller bytes pass
 * through.
 */
export function nibbleData(bytes: readonly number[]): number[] {
  const out: number[] = []
  for (const byte of bytes) {
    if (byte > 0x7f) {
      out.push(...split8BitToNibbles(byte))
    } else {
      assertWidth(byte, 7)
      out.push(byte)
    }
  }
  return out
}

// =============================================================================
// 7-bit Groups
// =============================================================================

/**
 * 28-bit value to four 7-bit bytes, MSB first.
 */
export function encodeRoland7Bit(value: number): [number, number, number, number] {
  assertWidth(value, 28)
  return [(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]
}

export function decodeRoland7Bit(bytes: readonly number[]): number {
  if (bytes.length !== 4) throw new RangeError(`Expected 4 bytes, got ${bytes.length}`)
  for (const byte of bytes) assertWidth(byte, 7)
  return (bytes[0] << 21) | (bytes[1] << 14) | (bytes[2] << 7) | bytes[3]
}

/**
 * 14-bit value to `[msb7, lsb7]`, as used by pitch bend.
 */
export function encode14BitTo7Bit(value: number): [number, number] {
  assertWidth(value, 14)
  return [(value >> 7) & 0x7f, value & 0x7f]
}

export function decode7BitTo14Bit(msb: number, lsb: number): number {
  assertWidth(msb, 7)
  assertWidth(lsb, 7)
  return (msb << 7) | lsb
}

// =============================================================================
// Parameter Payloads
// =============================================================================

export type ParameterSize = 1 | 4

/**
 * Raw parameter value to its data bytes. Four-byte parameters carry a 16-bit
 * value as four nibbles.
 */
export function encodeParameterValue(raw: number, size: ParameterSize): number[] {
  if (size === 4) return split16BitToNibbles(raw)
  return nibbleData([raw])
}

export function decodeParameterValue(bytes: readonly number[]): number {
  if (bytes.length === 4) return joinNibblesTo16Bit(bytes)
  if (bytes.length === 1) {
    assertWidth(bytes[0], 7)
    return bytes[0]
  }
  throw new RangeError(`Unsupported parameter payload of ${bytes.length} bytes`)
}

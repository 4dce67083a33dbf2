/**
 * Hierarchical 4-byte device memory address.
 */

import { AddressOverflowError } from '../errors'

export type AddressComponent = 'msb' | 'umb' | 'lmb' | 'lsb'

/** Signed per-component delta, in msb/umb/lmb/lsb order. */
export type AddressOffset = readonly [number, number, number, number]

export const ZERO_OFFSET: AddressOffset = [0, 0, 0, 0]

const COMPONENTS: readonly AddressComponent[] = ['msb', 'umb', 'lmb', 'lsb']

/**
 * Component-wise sum of two offsets.
 */
export function addOffsets(a: AddressOffset, b: AddressOffset): AddressOffset {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2], a[3] + b[3]]
}

/**
 * Offset for a linear byte index inside a section. Sections longer than 128
 * bytes continue on the next LMB.
 */
export function linearOffset(index: number): AddressOffset {
  return [0, 0, Math.floor(index / 128), index % 128]
}

function checkComponent(component: AddressComponent, value: number): number {
  if (!Number.isInteger(value) || value < 0x00 || value > 0x7f) {
    throw new AddressOverflowError(component, value)
  }
  return value
}

function hex2(value: number): string {
  return value.toString(16).padStart(2, '0')
}

/**
 * Immutable address value.
 *
 * Every component is a 7-bit byte. `offset` throws instead of carrying into
 * the next component, since a carry always means the caller combined an
 * offset with the wrong area.
 */
export class Address {
  readonly msb: number
  readonly umb: number
  readonly lmb: number
  readonly lsb: number

  constructor(msb: number, umb: number, lmb: number, lsb: number) {
    this.msb = checkComponent('msb', msb)
    this.umb = checkComponent('umb', umb)
    this.lmb = checkComponent('lmb', lmb)
    this.lsb = checkComponent('lsb', lsb)
    Object.freeze(this)
  }

  static fromBytes(bytes: ArrayLike<number>, start = 0): Address {
    if (bytes.length < start + 4) {
      throw new RangeError(`Need 4 address bytes at ${start}, buffer has ${bytes.length}`)
    }
    return new Address(bytes[start], bytes[start + 1], bytes[start + 2], bytes[start + 3])
  }

  offset(delta: AddressOffset): Address {
    const next = this.toBytes().map((value, i) => value + delta[i])
    next.forEach((value, i) => checkComponent(COMPONENTS[i], value))
    return new Address(next[0], next[1], next[2], next[3])
  }

  equals(other: Address): boolean {
    return this.msb === other.msb &&
      this.umb === other.umb &&
      this.lmb === other.lmb &&
      this.lsb === other.lsb
  }

  toBytes(): [number, number, number, number] {
    return [this.msb, this.umb, this.lmb, this.lsb]
  }

  /** Eight lowercase hex characters, e.g. `19420000`. */
  toHexString(): string {
    return this.toBytes().map(hex2).join('')
  }

  toString(): string {
    return this.toBytes().map(b => hex2(b).toUpperCase()).join(' ')
  }
}

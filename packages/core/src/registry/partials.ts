/**
 * Address arithmetic for families split into partials.
 */

import { Address, addOffsets, linearOffset, ZERO_OFFSET } from '../address/Address'
import type { AddressOffset } from '../address/Address'
import { drumKeyByNumber, DRUM_PARTIAL_STRIDE, FIRST_DRUM_KEY, LAST_DRUM_KEY } from '../address/areas'
import { AddressResolutionError, err, ok } from '../errors'
import type { Result } from '../errors'
import { FAMILY_LAYOUTS } from './layouts'
import type { ParameterDescriptor, ParameterFamily, PartialScheme } from './types'

const PARTIAL_COUNTS: Readonly<Record<Exclude<PartialScheme, 'none' | 'drum'>, number>> = {
  digital: 3,
  programPart: 4,
  programZone: 4
}

/**
 * LMB adjustment selecting one partial of a family, relative to the family's
 * first partial. Digital partials are numbered 1-3, program parts and zones
 * 1-4, and drum partials by MIDI key 36-72.
 */
export function getOffsetForPartial(
  family: ParameterFamily,
  partial?: number
): Result<AddressOffset, AddressResolutionError> {
  const scheme = FAMILY_LAYOUTS[family].partials

  if (scheme === 'none') {
    if (partial !== undefined) {
      return err(new AddressResolutionError(family, `${family} has no partials, got ${partial}`))
    }
    return ok(ZERO_OFFSET)
  }

  if (partial === undefined) {
    return err(new AddressResolutionError(family, `${family} requires a partial selector`))
  }

  if (scheme === 'drum') {
    if (!drumKeyByNumber(partial)) {
      return err(new AddressResolutionError(
        family,
        `Drum key ${partial} outside ${FIRST_DRUM_KEY}-${LAST_DRUM_KEY}`
      ))
    }
    return ok([0, 0, (partial - FIRST_DRUM_KEY) * DRUM_PARTIAL_STRIDE, 0])
  }

  const count = PARTIAL_COUNTS[scheme]
  if (!Number.isInteger(partial) || partial < 1 || partial > count) {
    return err(new AddressResolutionError(family, `${family} partial ${partial} outside 1-${count}`))
  }
  return ok([0, 0, partial - 1, 0])
}

/**
 * Offset from an area base address to the first byte of the family's
 * section, for the given partial.
 */
export function getSectionOffset(
  family: ParameterFamily,
  partial?: number
): Result<AddressOffset, AddressResolutionError> {
  const partialOffset = getOffsetForPartial(family, partial)
  if (!partialOffset.ok) return partialOffset
  return ok(addOffsets([0, 0, FAMILY_LAYOUTS[family].lmb, 0], partialOffset.value))
}

/**
 * Address of a parameter: area base, then section, then partial, then the
 * parameter's own offset.
 */
export function resolveParameterAddress(
  base: Address,
  descriptor: ParameterDescriptor,
  partial?: number
): Result<Address, AddressResolutionError> {
  const section = getSectionOffset(descriptor.family, partial)
  if (!section.ok) return section
  return ok(base.offset(section.value).offset(linearOffset(descriptor.offset)))
}

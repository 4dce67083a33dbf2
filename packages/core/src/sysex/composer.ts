/**
 * Builds DT1 and RQ1 messages from parameter descriptors.
 */

import { Address, linearOffset } from '../address/Address'
import type { AddressOffset } from '../address/Address'
import { resolveArea } from '../address/areas'
import { encodeParameterValue, nibbleData } from '../codec/nibble'
import {
  AddressOverflowError,
  AddressResolutionError,
  err,
  ok,
  UnknownParameterError,
  ValueOutOfRangeError
} from '../errors'
import type { ComposeError, Result } from '../errors'
import { convertFromMidi, convertToMidi, validateValue } from '../registry/conversion'
import { FAMILY_LAYOUTS, vendorToLinear } from '../registry/layouts'
import type { ParameterCatalog } from '../registry/ParameterCatalog'
import { getSectionOffset } from '../registry/partials'
import type { ParameterDescriptor, ParameterFamily } from '../registry/types'
import { checkFrame, validateHeader } from './checksum'
import { JDXI_DEVICE_ID, TONE_NAME_LENGTH } from './constants'
import { assertDeviceId, SysExMessage } from './SysExMessage'

export interface SysExComposerOptions {
  /** Device ID written into every frame (default 0x10) */
  deviceId?: number
}

/**
 * Composes messages against one parameter catalog.
 *
 * Every `compose*` method takes the base address of a memory area (see
 * `AREA_BASE_ADDRESSES`) and adds the section, partial and parameter offsets
 * itself.
 */
export class SysExComposer {
  private readonly deviceId: number

  constructor(
    private readonly catalog: ParameterCatalog,
    options: SysExComposerOptions = {}
  ) {
    this.deviceId = assertDeviceId(options.deviceId ?? JDXI_DEVICE_ID)
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * DT1 write of one parameter, from its display value.
   *
   * @param partial - Digital partial 1-3, drum key 36-72, or program part/zone 1-4
   */
  compose(
    base: Address,
    descriptor: ParameterDescriptor,
    displayValue: number,
    partial?: number
  ): Result<SysExMessage, ComposeError> {
    if (!this.catalog.contains(descriptor)) {
      return err(new UnknownParameterError(
        descriptor.name,
        `${descriptor.family}.${descriptor.name} is not in this catalog`
      ))
    }

    const reachable = this.checkReachable(base, descriptor.family, descriptor.name)
    if (!reachable.ok) return reachable

    const section = this.sectionAddress(base, descriptor.family, partial)
    if (!section.ok) return section

    const raw = this.toRaw(descriptor, displayValue)
    if (!raw.ok) return raw

    const address = this.offsetAddress(section.value, linearOffset(descriptor.offset), descriptor.family)
    if (!address.ok) return address

    const data = nibbleData(encodeParameterValue(raw.value, descriptor.size))
    return ok(this.finish(SysExMessage.dt1(address.value, data, this.deviceId)))
  }

  /**
   * Same as `compose`, looking the descriptor up by family and name.
   */
  composeByName(
    base: Address,
    family: ParameterFamily,
    name: string,
    displayValue: number,
    partial?: number
  ): Result<SysExMessage, ComposeError> {
    const descriptor = this.catalog.getByName(family, name)
    if (!descriptor) {
      return err(new UnknownParameterError(name, `No parameter ${name} in ${family}`))
    }
    return this.compose(base, descriptor, displayValue, partial)
  }

  /**
   * Raw DT1 write. Data bytes must already be 7-bit.
   */
  composeData(address: Address, data: readonly number[]): SysExMessage {
    return this.finish(SysExMessage.dt1(address, data, this.deviceId))
  }

  /**
   * Write a tone, kit or partial name. The name is padded with spaces to 12
   * characters; characters outside printable ASCII become spaces.
   */
  composeToneName(
    base: Address,
    family: ParameterFamily,
    name: string,
    partial?: number
  ): Result<SysExMessage, ComposeError> {
    if (!FAMILY_LAYOUTS[family].named) {
      return err(new UnknownParameterError('NAME', `${family} has no name field`))
    }
    const reachable = this.checkReachable(base, family, 'NAME')
    if (!reachable.ok) return reachable

    const section = this.sectionAddress(base, family, partial)
    if (!section.ok) return section

    return ok(this.finish(SysExMessage.dt1(section.value, encodeToneName(name), this.deviceId)))
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  /**
   * RQ1 for a whole section.
   */
  composeRequest(
    base: Address,
    family: ParameterFamily,
    partial?: number
  ): Result<SysExMessage, ComposeError> {
    const reachable = this.checkReachable(base, family, family)
    if (!reachable.ok) return reachable

    const section = this.sectionAddress(base, family, partial)
    if (!section.ok) return section

    const size = vendorToLinear(FAMILY_LAYOUTS[family].requestSize)
    return ok(this.finish(SysExMessage.rq1(section.value, size, this.deviceId)))
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private checkReachable(
    base: Address,
    family: ParameterFamily,
    parameter: string
  ): Result<true, UnknownParameterError> {
    const area = resolveArea(base.msb, base.umb)
    if (area === 'Unknown' || !FAMILY_LAYOUTS[family].areas.includes(area)) {
      return err(new UnknownParameterError(
        parameter,
        `${family} is not reachable from address ${base.toString()}`
      ))
    }
    return ok(true)
  }

  private sectionAddress(
    base: Address,
    family: ParameterFamily,
    partial: number | undefined
  ): Result<Address, AddressResolutionError> {
    const offset = getSectionOffset(family, partial)
    if (!offset.ok) return offset
    return this.offsetAddress(base, offset.value, family)
  }

  private offsetAddress(
    address: Address,
    offset: AddressOffset,
    family: ParameterFamily
  ): Result<Address, AddressResolutionError> {
    try {
      return ok(address.offset(offset))
    } catch (error) {
      if (error instanceof AddressOverflowError) {
        return err(new AddressResolutionError(family, `${family} offset overflows ${address.toString()}: ${error.message}`))
      }
      throw error
    }
  }

  private toRaw(descriptor: ParameterDescriptor, display: number): Result<number, ValueOutOfRangeError> {
    // Wrong sign is rejected, not clamped
    if (!Number.isFinite(display) || (display < 0 && descriptor.displayMin >= 0)) {
      return err(new ValueOutOfRangeError(descriptor.name, display, descriptor.displayMin, descriptor.displayMax))
    }

    const raw = convertToMidi(descriptor, display)
    const clamped = validateValue(descriptor, raw)
    if (clamped !== raw) {
      console.warn(
        `SysExComposer: ${descriptor.name} value ${display} clamped to ${convertFromMidi(descriptor, clamped)}`
      )
    }
    return ok(clamped)
  }

  private finish(message: SysExMessage): SysExMessage {
    const bytes = message.toBytes()
    const frame = checkFrame(bytes)
    if (!frame.ok) throw frame.error
    const header = validateHeader(bytes, this.deviceId)
    if (!header.ok) throw header.error
    return message
  }
}

/**
 * Twelve ASCII bytes for a name field.
 */
export function encodeToneName(name: string): number[] {
  const bytes: number[] = []
  const chars = [...name]
  for (let i = 0; i < TONE_NAME_LENGTH; i++) {
    const code = chars[i]?.codePointAt(0) ?? 0x20
    bytes.push(code >= 0x20 && code <= 0x7e ? code : 0x20)
  }
  return bytes
}

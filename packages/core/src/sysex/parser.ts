/**
 * Decodes DT1 replies into named parameter values.
 */

import type { Address } from '../address/Address'
import { resolveArea } from '../address/areas'
import type { ResolvedArea } from '../address/areas'
import { decodeParameterValue } from '../codec/nibble'
import { ok } from '../errors'
import type { ParseError, Result } from '../errors'
import { convertFromMidi, validateValue } from '../registry/conversion'
import { FAMILY_LAYOUTS } from '../registry/layouts'
import type { ParameterCatalog } from '../registry/ParameterCatalog'
import type { ParameterRegistry } from '../registry/ParameterRegistry'
import { resolveSection } from '../registry/sections'
import type { ParameterDescriptor, ParameterFamily } from '../registry/types'
import { JDXI_DEVICE_ID, TONE_NAME_LENGTH } from './constants'
import { assertDeviceId, SysExMessage } from './SysExMessage'

// =============================================================================
// Types
// =============================================================================

export interface SysExParserOptions {
  /** Reject frames with a bad checksum (default true) */
  verifyChecksum?: boolean
  /** Expected device ID (default 0x10) */
  deviceId?: number
  /** Log addresses that resolve to no known section */
  debug?: boolean
}

/**
 * Result of decoding one DT1 message. Parameters outside the received data
 * are listed in `failures`; they never fail the whole parse.
 */
export interface ParsedToneData {
  readonly area: ResolvedArea
  /** `Common`, `Partial1`, a drum voice such as `BD1`, ... or `Unknown` */
  readonly tone: string
  readonly family: ParameterFamily | null
  /** Digital partial, drum key or program part the section belongs to */
  readonly partial: number | null
  readonly address: Address
  readonly name: string | null
  readonly values: Readonly<Record<string, number>>
  readonly successes: readonly string[]
  readonly failures: readonly string[]
  /** Section offsets of received bytes that no parameter covers */
  readonly unmatchedOffsets: readonly number[]
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Printable ASCII of a name field, trailing padding removed.
 */
export function decodeToneName(bytes: readonly number[]): string {
  return bytes
    .filter(byte => byte >= 0x20 && byte <= 0x7e)
    .map(byte => String.fromCharCode(byte))
    .join('')
    .trimEnd()
}

function readRaw(descriptor: ParameterDescriptor, data: readonly number[], index: number): number | undefined {
  if (index < 0 || index + descriptor.size > data.length) return undefined
  const bytes = data.slice(index, index + descriptor.size)
  if (descriptor.size === 4 && bytes.some(byte => byte > 0x0f)) return undefined
  return decodeParameterValue(bytes)
}

// =============================================================================
// SysExParser
// =============================================================================

export class SysExParser {
  private readonly verifyChecksum: boolean
  private readonly deviceId: number
  private readonly debug: boolean

  constructor(
    private readonly catalog: ParameterCatalog,
    options: SysExParserOptions = {}
  ) {
    this.verifyChecksum = options.verifyChecksum ?? true
    this.deviceId = assertDeviceId(options.deviceId ?? JDXI_DEVICE_ID)
    this.debug = options.debug ?? false
  }

  /**
   * Decode a DT1 frame.
   *
   * Framing, header and checksum problems reject the message. Everything
   * after that is best effort: an unknown section yields tone `Unknown` and
   * no values, and a parameter beyond the received data goes to `failures`.
   */
  parse(bytes: ArrayLike<number>): Result<ParsedToneData, ParseError> {
    const decoded = SysExMessage.fromBytes(bytes, {
      deviceId: this.deviceId,
      verifyChecksum: this.verifyChecksum
    })
    if (!decoded.ok) return decoded
    return ok(this.decode(decoded.value))
  }

  /**
   * Decode an already validated message.
   */
  decode(message: SysExMessage): ParsedToneData {
    const { address, data } = message
    const area = resolveArea(address.msb, address.umb)
    const section = message.isDataSet ? resolveSection(area, address.lmb) : undefined

    if (!section) {
      if (this.debug) {
        console.warn(`SysExParser: No section for address ${address.toString()} (area ${area})`)
      }
      return {
        area,
        tone: 'Unknown',
        family: null,
        partial: null,
        address,
        name: null,
        values: {},
        successes: [],
        failures: [],
        unmatchedOffsets: []
      }
    }

    // Linear position of data[0] inside the section
    const start = (address.lmb - section.lmb) * 128 + address.lsb
    const registry = section.family ? this.catalog.get(section.family) : undefined
    const named = section.family !== null && FAMILY_LAYOUTS[section.family].named

    const values: Record<string, number> = {}
    const successes: string[] = []
    const failures: string[] = []

    for (const descriptor of registry?.list() ?? []) {
      const raw = readRaw(descriptor, data, descriptor.offset - start)
      if (raw === undefined) {
        failures.push(descriptor.name)
        continue
      }
      values[descriptor.name] = convertFromMidi(descriptor, validateValue(descriptor, raw))
      successes.push(descriptor.name)
    }

    return {
      area,
      tone: section.tone,
      family: section.family,
      partial: section.partial ?? null,
      address,
      name: named && start === 0 && data.length >= TONE_NAME_LENGTH
        ? decodeToneName(data.slice(0, TONE_NAME_LENGTH))
        : null,
      values,
      successes,
      failures,
      unmatchedOffsets: this.unmatchedOffsets(registry, named, start, data.length)
    }
  }

  private unmatchedOffsets(
    registry: ParameterRegistry | undefined,
    named: boolean,
    start: number,
    length: number
  ): number[] {
    const unmatched: number[] = []
    for (let offset = start; offset < start + length; offset++) {
      if (named && offset < TONE_NAME_LENGTH) continue
      if (!registry?.getByOffset(offset)) unmatched.push(offset)
    }
    return unmatched
  }
}

/**
 * Builds frozen descriptors from the JSON parameter tables.
 */

import type { ParameterSize } from '../codec/nibble'
import { rawToDisplay } from './conversion'
import { vendorToLinear } from './layouts'
import type { BipolarCenter, ParameterDescriptor, ParameterFamily } from './types'

/**
 * A parameter table does not have the expected shape.
 */
export class ParameterTableError extends Error {
  constructor(
    public readonly family: string,
    public readonly entry: string,
    public readonly reason: string
  ) {
    super(`${family} table, ${entry}: ${reason}`)
    this.name = 'ParameterTableError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const check = {
  integer(family: string, entry: string, key: string, value: unknown): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ParameterTableError(family, entry, `${key} must be an integer`)
    }
    return value
  },

  optionalInteger(family: string, entry: string, key: string, value: unknown, fallback: number): number {
    return value === undefined ? fallback : check.integer(family, entry, key, value)
  },

  /** `"0x115"` style offsets */
  vendorHex(family: string, entry: string, value: unknown): number {
    if (typeof value !== 'string' || !/^0x[0-9a-f]+$/i.test(value)) {
      throw new ParameterTableError(family, entry, 'offset must be a hex string')
    }
    const vendor = parseInt(value, 16)
    if ((vendor & 0xff) > 0x7f) {
      throw new ParameterTableError(family, entry, `offset ${value} has a low byte above 0x7F`)
    }
    return vendorToLinear(vendor)
  },

  size(family: string, entry: string, value: unknown): ParameterSize {
    if (value === undefined || value === 1) return 1
    if (value === 4) return 4
    throw new ParameterTableError(family, entry, 'size must be 1 or 4')
  },

  bipolar(family: string, entry: string, value: unknown): BipolarCenter | undefined {
    if (value === undefined) return undefined
    if (!isRecord(value)) throw new ParameterTableError(family, entry, 'bipolar must be an object')
    const step = check.optionalInteger(family, entry, 'bipolar.step', value.step, 1)
    const divisor = check.optionalInteger(family, entry, 'bipolar.divisor', value.divisor, 1)
    if (step <= 0 || divisor <= 0) {
      throw new ParameterTableError(family, entry, 'bipolar step and divisor must be positive')
    }
    return Object.freeze({
      center: check.integer(family, entry, 'bipolar.center', value.center),
      step,
      divisor
    })
  }
}

/**
 * Parse one family table: `{ family, parameters: [...] }`.
 */
export function loadParameterTable(family: ParameterFamily, table: unknown): readonly ParameterDescriptor[] {
  if (!isRecord(table) || table.family !== family || !Array.isArray(table.parameters)) {
    throw new ParameterTableError(family, 'root', `expected { family: "${family}", parameters: [] }`)
  }

  return Object.freeze(table.parameters.map((entry: unknown, index: number): ParameterDescriptor => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new ParameterTableError(family, `#${index}`, 'name must be a string')
    }
    const name = entry.name
    const min = check.integer(family, name, 'min', entry.min)
    const max = check.integer(family, name, 'max', entry.max)
    if (min > max) throw new ParameterTableError(family, name, `min ${min} exceeds max ${max}`)

    const size = check.size(family, name, entry.size)
    if (max > (size === 4 ? 0xffff : 0x7f)) {
      throw new ParameterTableError(family, name, `max ${max} does not fit ${size} byte(s)`)
    }

    const bipolar = check.bipolar(family, name, entry.bipolar)
    const descriptor: ParameterDescriptor = {
      name,
      family,
      offset: check.vendorHex(family, name, entry.offset),
      min,
      max,
      displayMin: rawToDisplay(bipolar, min),
      displayMax: rawToDisplay(bipolar, max),
      isSwitch: entry.switch === true,
      size,
      ...(bipolar ? { bipolar } : {}),
      ...(typeof entry.tooltip === 'string' ? { tooltip: entry.tooltip } : {})
    }
    return Object.freeze(descriptor)
  }))
}

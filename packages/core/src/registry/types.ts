/**
 * Parameter descriptor types.
 */

import type { AreaTag } from '../address/areas'
import type { ParameterSize } from '../codec/nibble'

// =============================================================================
// Families
// =============================================================================

export const PARAMETER_FAMILIES = [
  'SystemCommon',
  'ProgramCommon',
  'VocalFx',
  'Effect1',
  'Effect2',
  'Delay',
  'Reverb',
  'ProgramPart',
  'ProgramZone',
  'Arpeggio',
  'DigitalCommon',
  'DigitalPartial',
  'DigitalModify',
  'Analog',
  'DrumCommon',
  'DrumPartial'
] as const

export type ParameterFamily = typeof PARAMETER_FAMILIES[number]

export function isParameterFamily(value: string): value is ParameterFamily {
  return PARAMETER_FAMILIES.some(family => family === value)
}

// =============================================================================
// Descriptors
// =============================================================================

/**
 * Display conversion: `display = (raw - center) * step / divisor`.
 *
 * Besides true bipolar fields (pan, depth, tune) this also covers plain
 * offsets such as FXM color, shown as 1-4 for raw 0-3 (center -1).
 */
export interface BipolarCenter {
  readonly center: number
  readonly step: number
  readonly divisor: number
}

export interface ParameterDescriptor {
  readonly name: string
  readonly family: ParameterFamily
  /** Linear byte index inside the family's section */
  readonly offset: number
  readonly min: number
  readonly max: number
  readonly displayMin: number
  readonly displayMax: number
  readonly bipolar?: BipolarCenter
  readonly isSwitch: boolean
  readonly size: ParameterSize
  readonly tooltip?: string
}

// =============================================================================
// Layout
// =============================================================================

/**
 * How partial numbers address sub-sections of a family.
 *
 * - `digital`: partials 1-3
 * - `drum`: MIDI keys 36-72
 * - `programPart`, `programZone`: parts 1-4 (Digital 1, Digital 2, Analog, Drum)
 */
export type PartialScheme = 'none' | 'digital' | 'drum' | 'programPart' | 'programZone'

export interface FamilyLayout {
  readonly family: ParameterFamily
  /** Areas whose base address can carry this family */
  readonly areas: readonly AreaTag[]
  /** LMB of the section (of the first partial, for multi-partial families) */
  readonly lmb: number
  readonly partials: PartialScheme
  /** Byte count requested by RQ1, in vendor notation */
  readonly requestSize: number
  /** Section opens with a 12-character name */
  readonly named: boolean
}

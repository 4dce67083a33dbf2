/**
 * JD-Xi memory map: start bytes, temporary areas and section LMBs.
 */

import { Address } from './Address'
import drumKeyTable from '../../data/drum-keys.json'

// =============================================================================
// Memory Map Constants
// =============================================================================

export const StartMSB = {
  SYSTEM: 0x01,
  SETUP: 0x02,
  TEMPORARY_PROGRAM: 0x18,
  TEMPORARY_TONE: 0x19
} as const

export const TemporaryToneUMB = {
  DIGITAL_SYNTH_1: 0x01,
  DIGITAL_SYNTH_2: 0x21,
  ANALOG_SYNTH: 0x42,
  DRUM_KIT: 0x70
} as const

export const SystemLMB = {
  COMMON: 0x00,
  CONTROLLER: 0x03
} as const

export const SuperNaturalLMB = {
  COMMON: 0x00,
  PARTIAL_1: 0x20,
  PARTIAL_2: 0x21,
  PARTIAL_3: 0x22,
  MODIFY: 0x50
} as const

export const ProgramLMB = {
  COMMON: 0x00,
  VOCAL_EFFECT: 0x01,
  EFFECT_1: 0x02,
  EFFECT_2: 0x04,
  DELAY: 0x06,
  REVERB: 0x08,
  PART_DIGITAL_SYNTH_1: 0x20,
  PART_DIGITAL_SYNTH_2: 0x21,
  PART_ANALOG: 0x22,
  PART_DRUM: 0x23,
  ZONE_DIGITAL_SYNTH_1: 0x30,
  ZONE_DIGITAL_SYNTH_2: 0x31,
  ZONE_ANALOG: 0x32,
  ZONE_DRUM: 0x33,
  CONTROLLER: 0x40
} as const

export const DrumKitLMB = {
  COMMON: 0x00
} as const

// =============================================================================
// Areas
// =============================================================================

export type AreaTag =
  | 'System'
  | 'Setup'
  | 'Program'
  | 'DigitalSynth1'
  | 'DigitalSynth2'
  | 'Analog'
  | 'Drum'

export type ResolvedArea = AreaTag | 'Unknown'

export const AREA_BASE_ADDRESSES: Readonly<Record<AreaTag, Address>> = Object.freeze({
  System: new Address(StartMSB.SYSTEM, 0x00, 0x00, 0x00),
  Setup: new Address(StartMSB.SETUP, 0x00, 0x00, 0x00),
  Program: new Address(StartMSB.TEMPORARY_PROGRAM, 0x00, 0x00, 0x00),
  DigitalSynth1: new Address(StartMSB.TEMPORARY_TONE, TemporaryToneUMB.DIGITAL_SYNTH_1, 0x00, 0x00),
  DigitalSynth2: new Address(StartMSB.TEMPORARY_TONE, TemporaryToneUMB.DIGITAL_SYNTH_2, 0x00, 0x00),
  Analog: new Address(StartMSB.TEMPORARY_TONE, TemporaryToneUMB.ANALOG_SYNTH, 0x00, 0x00),
  Drum: new Address(StartMSB.TEMPORARY_TONE, TemporaryToneUMB.DRUM_KIT, 0x00, 0x00)
})

/**
 * Area from the first two address bytes.
 */
export function resolveArea(msb: number, umb: number): ResolvedArea {
  switch (msb) {
    case StartMSB.SYSTEM:
      return 'System'
    case StartMSB.SETUP:
      return 'Setup'
    case StartMSB.TEMPORARY_PROGRAM:
      return 'Program'
    case StartMSB.TEMPORARY_TONE:
      switch (umb) {
        case TemporaryToneUMB.DIGITAL_SYNTH_1: return 'DigitalSynth1'
        case TemporaryToneUMB.DIGITAL_SYNTH_2: return 'DigitalSynth2'
        case TemporaryToneUMB.ANALOG_SYNTH: return 'Analog'
        case TemporaryToneUMB.DRUM_KIT: return 'Drum'
        default: return 'Unknown'
      }
    default:
      return 'Unknown'
  }
}

// =============================================================================
// Drum Kit Keys
// =============================================================================

export interface DrumKey {
  /** MIDI note number */
  readonly key: number
  /** Voice label, e.g. `BD1` */
  readonly name: string
  readonly lmb: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function loadDrumKeys(table: unknown): readonly DrumKey[] {
  if (!isRecord(table) || !Array.isArray(table.keys)) {
    throw new Error('Drum key table is malformed')
  }
  return Object.freeze(table.keys.map((entry: unknown, index: number) => {
    if (!isRecord(entry) ||
        typeof entry.key !== 'number' ||
        typeof entry.name !== 'string' ||
        typeof entry.lmb !== 'string') {
      throw new Error(`Drum key entry ${index} is malformed`)
    }
    return Object.freeze({ key: entry.key, name: entry.name, lmb: parseInt(entry.lmb, 16) })
  }))
}

/** Keys 36-72, each a drum partial two LMBs apart from 0x2E. */
export const DRUM_KEYS: readonly DrumKey[] = loadDrumKeys(drumKeyTable)

export const DRUM_PARTIAL_BASE_LMB = DRUM_KEYS[0].lmb
export const DRUM_PARTIAL_STRIDE = 2
export const FIRST_DRUM_KEY = DRUM_KEYS[0].key
export const LAST_DRUM_KEY = DRUM_KEYS[DRUM_KEYS.length - 1].key

const drumKeysByLmb = new Map(DRUM_KEYS.map(k => [k.lmb, k] as const))
const drumKeysByNumber = new Map(DRUM_KEYS.map(k => [k.key, k] as const))

export function drumKeyByLmb(lmb: number): DrumKey | undefined {
  return drumKeysByLmb.get(lmb)
}

export function drumKeyByNumber(key: number): DrumKey | undefined {
  return drumKeysByNumber.get(key)
}

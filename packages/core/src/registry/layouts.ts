import { ProgramLMB, SuperNaturalLMB, SystemLMB, DrumKitLMB, DRUM_PARTIAL_BASE_LMB } from '../address/areas'
import type { FamilyLayout, ParameterFamily } from './types'

/**
 * Where each family lives in the memory map.
 *
 * Request sizes follow the vendor notation used for offsets: `0x143` is one
 * full LMB plus 0x43 bytes.
 */
export const FAMILY_LAYOUTS: Readonly<Record<ParameterFamily, FamilyLayout>> = Object.freeze({
  SystemCommon: {
    family: 'SystemCommon', areas: ['System'], lmb: SystemLMB.COMMON,
    partials: 'none', requestSize: 0x2b, named: false
  },
  ProgramCommon: {
    family: 'ProgramCommon', areas: ['Program'], lmb: ProgramLMB.COMMON,
    partials: 'none', requestSize: 0x1f, named: true
  },
  VocalFx: {
    family: 'VocalFx', areas: ['Program'], lmb: ProgramLMB.VOCAL_EFFECT,
    partials: 'none', requestSize: 0x18, named: false
  },
  Effect1: {
    family: 'Effect1', areas: ['Program'], lmb: ProgramLMB.EFFECT_1,
    partials: 'none', requestSize: 0x111, named: false
  },
  Effect2: {
    family: 'Effect2', areas: ['Program'], lmb: ProgramLMB.EFFECT_2,
    partials: 'none', requestSize: 0x111, named: false
  },
  Delay: {
    family: 'Delay', areas: ['Program'], lmb: ProgramLMB.DELAY,
    partials: 'none', requestSize: 0x68, named: false
  },
  Reverb: {
    family: 'Reverb', areas: ['Program'], lmb: ProgramLMB.REVERB,
    partials: 'none', requestSize: 0x67, named: false
  },
  ProgramPart: {
    family: 'ProgramPart', areas: ['Program'], lmb: ProgramLMB.PART_DIGITAL_SYNTH_1,
    partials: 'programPart', requestSize: 0x4c, named: false
  },
  ProgramZone: {
    family: 'ProgramZone', areas: ['Program'], lmb: ProgramLMB.ZONE_DIGITAL_SYNTH_1,
    partials: 'programZone', requestSize: 0x23, named: false
  },
  Arpeggio: {
    family: 'Arpeggio', areas: ['Program'], lmb: ProgramLMB.CONTROLLER,
    partials: 'none', requestSize: 0x34, named: false
  },
  DigitalCommon: {
    family: 'DigitalCommon', areas: ['DigitalSynth1', 'DigitalSynth2'], lmb: SuperNaturalLMB.COMMON,
    partials: 'none', requestSize: 0x40, named: true
  },
  DigitalPartial: {
    family: 'DigitalPartial', areas: ['DigitalSynth1', 'DigitalSynth2'], lmb: SuperNaturalLMB.PARTIAL_1,
    partials: 'digital', requestSize: 0x3d, named: false
  },
  DigitalModify: {
    family: 'DigitalModify', areas: ['DigitalSynth1', 'DigitalSynth2'], lmb: SuperNaturalLMB.MODIFY,
    partials: 'none', requestSize: 0x25, named: false
  },
  Analog: {
    family: 'Analog', areas: ['Analog'], lmb: 0x00,
    partials: 'none', requestSize: 0x40, named: true
  },
  DrumCommon: {
    family: 'DrumCommon', areas: ['Drum'], lmb: DrumKitLMB.COMMON,
    partials: 'none', requestSize: 0x12, named: true
  },
  DrumPartial: {
    family: 'DrumPartial', areas: ['Drum'], lmb: DRUM_PARTIAL_BASE_LMB,
    partials: 'drum', requestSize: 0x143, named: true
  }
})

/** Converts a vendor-notation size or offset (`0x143`) to a byte count. */
export function vendorToLinear(value: number): number {
  return (value >> 8) * 128 + (value & 0xff)
}

/**
 * Program Common offsets that the vendor guide and the shipped tables
 * disagree on. The tables use `table`; both stay exported until the
 * placement is confirmed on hardware.
 */
export const ProgramCommonOffsetCandidates = Object.freeze({
  PROGRAM_LEVEL: { table: 0x10, guide: 0x16 },
  PROGRAM_TEMPO: { table: 0x11, guide: 0x17 }
} as const)

/**
 * Reverse lookup from address bytes to family, tone and partial.
 */

import { DRUM_KEYS, ProgramLMB, SuperNaturalLMB, SystemLMB } from '../address/areas'
import type { AreaTag, ResolvedArea } from '../address/areas'
import { FAMILY_LAYOUTS, vendorToLinear } from './layouts'
import type { ParameterFamily } from './types'

export interface SectionMatch {
  readonly tone: string
  /** `null` for sections without a parameter table */
  readonly family: ParameterFamily | null
  readonly partial?: number
  /** LMB where the section starts */
  readonly lmb: number
}

interface SectionEntry extends SectionMatch {
  readonly area: AreaTag
}

function section(
  area: AreaTag,
  lmb: number,
  tone: string,
  family: ParameterFamily | null,
  partial?: number
): SectionEntry {
  return partial === undefined ? { area, lmb, tone, family } : { area, lmb, tone, family, partial }
}

const SECTIONS: readonly SectionEntry[] = [
  section('System', SystemLMB.COMMON, 'Common', 'SystemCommon'),
  section('System', SystemLMB.CONTROLLER, 'Controller', null),
  section('Setup', 0x00, 'Common', null),

  section('Program', ProgramLMB.COMMON, 'Common', 'ProgramCommon'),
  section('Program', ProgramLMB.VOCAL_EFFECT, 'VocalFx', 'VocalFx'),
  section('Program', ProgramLMB.EFFECT_1, 'Effect1', 'Effect1'),
  section('Program', ProgramLMB.EFFECT_2, 'Effect2', 'Effect2'),
  section('Program', ProgramLMB.DELAY, 'Delay', 'Delay'),
  section('Program', ProgramLMB.REVERB, 'Reverb', 'Reverb'),
  section('Program', ProgramLMB.PART_DIGITAL_SYNTH_1, 'PartDigitalSynth1', 'ProgramPart', 1),
  section('Program', ProgramLMB.PART_DIGITAL_SYNTH_2, 'PartDigitalSynth2', 'ProgramPart', 2),
  section('Program', ProgramLMB.PART_ANALOG, 'PartAnalog', 'ProgramPart', 3),
  section('Program', ProgramLMB.PART_DRUM, 'PartDrum', 'ProgramPart', 4),
  section('Program', ProgramLMB.ZONE_DIGITAL_SYNTH_1, 'ZoneDigitalSynth1', 'ProgramZone', 1),
  section('Program', ProgramLMB.ZONE_DIGITAL_SYNTH_2, 'ZoneDigitalSynth2', 'ProgramZone', 2),
  section('Program', ProgramLMB.ZONE_ANALOG, 'ZoneAnalog', 'ProgramZone', 3),
  section('Program', ProgramLMB.ZONE_DRUM, 'ZoneDrum', 'ProgramZone', 4),
  section('Program', ProgramLMB.CONTROLLER, 'Controller', 'Arpeggio'),

  ...(['DigitalSynth1', 'DigitalSynth2'] as const).flatMap(area => [
    section(area, SuperNaturalLMB.COMMON, 'Common', 'DigitalCommon'),
    section(area, SuperNaturalLMB.PARTIAL_1, 'Partial1', 'DigitalPartial', 1),
    section(area, SuperNaturalLMB.PARTIAL_2, 'Partial2', 'DigitalPartial', 2),
    section(area, SuperNaturalLMB.PARTIAL_3, 'Partial3', 'DigitalPartial', 3),
    section(area, SuperNaturalLMB.MODIFY, 'Modify', 'DigitalModify')
  ]),

  section('Analog', 0x00, 'Common', 'Analog'),

  section('Drum', 0x00, 'Common', 'DrumCommon'),
  ...DRUM_KEYS.map(key => section('Drum', key.lmb, key.name, 'DrumPartial', key.key))
]

const sectionIndex = new Map(SECTIONS.map(entry => [`${entry.area}:${entry.lmb}`, entry] as const))

function spansNextLmb(family: ParameterFamily | null): boolean {
  return family !== null && vendorToLinear(FAMILY_LAYOUTS[family].requestSize) > 128
}

/**
 * Resolve the section an address LMB falls in. Sections longer than 128
 * bytes (drum partials, effects 1 and 2) also match their second LMB.
 */
export function resolveSection(area: ResolvedArea, lmb: number): SectionMatch | undefined {
  if (area === 'Unknown') return undefined

  const direct = sectionIndex.get(`${area}:${lmb}`)
  if (direct) return direct

  const previous = sectionIndex.get(`${area}:${lmb - 1}`)
  if (previous && spansNextLmb(previous.family)) return previous

  return undefined
}

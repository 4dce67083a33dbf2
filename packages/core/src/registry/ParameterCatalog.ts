import analogTable from '../../data/parameters/analog.json'
import arpeggioTable from '../../data/parameters/arpeggio.json'
import delayTable from '../../data/parameters/delay.json'
import digitalCommonTable from '../../data/parameters/digital-common.json'
import digitalModifyTable from '../../data/parameters/digital-modify.json'
import digitalPartialTable from '../../data/parameters/digital-partial.json'
import drumCommonTable from '../../data/parameters/drum-common.json'
import drumPartialTable from '../../data/parameters/drum-partial.json'
import effect1Table from '../../data/parameters/effect1.json'
import effect2Table from '../../data/parameters/effect2.json'
import programCommonTable from '../../data/parameters/program-common.json'
import programPartTable from '../../data/parameters/program-part.json'
import programZoneTable from '../../data/parameters/program-zone.json'
import reverbTable from '../../data/parameters/reverb.json'
import systemCommonTable from '../../data/parameters/system-common.json'
import vocalFxTable from '../../data/parameters/vocal-fx.json'
import { FAMILY_LAYOUTS } from './layouts'
import { loadParameterTable } from './loader'
import { ParameterRegistry } from './ParameterRegistry'
import { PARAMETER_FAMILIES } from './types'
import type { ParameterDescriptor, ParameterFamily } from './types'

const PARAMETER_TABLES: Readonly<Record<ParameterFamily, unknown>> = {
  SystemCommon: systemCommonTable,
  ProgramCommon: programCommonTable,
  VocalFx: vocalFxTable,
  Effect1: effect1Table,
  Effect2: effect2Table,
  Delay: delayTable,
  Reverb: reverbTable,
  ProgramPart: programPartTable,
  ProgramZone: programZoneTable,
  Arpeggio: arpeggioTable,
  DigitalCommon: digitalCommonTable,
  DigitalPartial: digitalPartialTable,
  DigitalModify: digitalModifyTable,
  Analog: analogTable,
  DrumCommon: drumCommonTable,
  DrumPartial: drumPartialTable
}

/**
 * All family registries, looked up by family tag.
 *
 * Build one with `createParameterCatalog()` at startup and pass it to the
 * composer and parser. It is never mutated afterwards.
 */
export class ParameterCatalog {
  private readonly registries = new Map<ParameterFamily, ParameterRegistry>()

  constructor(registries: Iterable<ParameterRegistry>) {
    for (const registry of registries) {
      if (this.registries.has(registry.family)) {
        throw new Error(`Registry for ${registry.family} already present`)
      }
      this.registries.set(registry.family, registry)
    }
  }

  get(family: ParameterFamily): ParameterRegistry | undefined {
    return this.registries.get(family)
  }

  getByName(family: ParameterFamily, name: string): ParameterDescriptor | undefined {
    return this.registries.get(family)?.getByName(name)
  }

  getByOffset(family: ParameterFamily, offset: number): ParameterDescriptor | undefined {
    return this.registries.get(family)?.getByOffset(offset)
  }

  /**
   * Check that a descriptor instance comes from this catalog.
   */
  contains(descriptor: ParameterDescriptor): boolean {
    return this.registries.get(descriptor.family)?.has(descriptor) ?? false
  }

  families(): ParameterFamily[] {
    return [...this.registries.keys()]
  }
}

/**
 * Load every bundled parameter table.
 */
export function createParameterCatalog(): ParameterCatalog {
  return new ParameterCatalog(PARAMETER_FAMILIES.map(family =>
    new ParameterRegistry(FAMILY_LAYOUTS[family], loadParameterTable(family, PARAMETER_TABLES[family]))
  ))
}

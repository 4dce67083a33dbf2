import type { FamilyLayout, ParameterDescriptor, ParameterFamily } from './types'

/**
 * Read-only descriptor set for one family, indexed by name and by every byte
 * a descriptor occupies.
 */
export class ParameterRegistry {
  private readonly byName = new Map<string, ParameterDescriptor>()
  private readonly byOffset = new Map<number, ParameterDescriptor>()
  private readonly ordered: readonly ParameterDescriptor[]

  constructor(
    readonly layout: FamilyLayout,
    descriptors: readonly ParameterDescriptor[]
  ) {
    for (const descriptor of descriptors) {
      if (descriptor.family !== layout.family) {
        throw new Error(`${descriptor.name} belongs to ${descriptor.family}, not ${layout.family}`)
      }
      if (this.byName.has(descriptor.name)) {
        throw new Error(`Parameter "${descriptor.name}" already registered in ${layout.family}`)
      }
      this.byName.set(descriptor.name, descriptor)

      for (let i = 0; i < descriptor.size; i++) {
        const taken = this.byOffset.get(descriptor.offset + i)
        if (taken) {
          throw new Error(
            `${layout.family}: ${descriptor.name} overlaps ${taken.name} at offset ${descriptor.offset + i}`
          )
        }
        this.byOffset.set(descriptor.offset + i, descriptor)
      }
    }
    this.ordered = Object.freeze([...descriptors].sort((a, b) => a.offset - b.offset))
  }

  get family(): ParameterFamily {
    return this.layout.family
  }

  /**
   * Get descriptor by name.
   */
  getByName(name: string): ParameterDescriptor | undefined {
    return this.byName.get(name)
  }

  /**
   * Get the descriptor covering a linear byte offset, including the inner
   * bytes of four-byte parameters.
   */
  getByOffset(offset: number): ParameterDescriptor | undefined {
    return this.byOffset.get(offset)
  }

  /**
   * Check that this exact descriptor is registered here.
   */
  has(descriptor: ParameterDescriptor): boolean {
    return this.byName.get(descriptor.name) === descriptor
  }

  /** Descriptors in offset order. */
  list(): readonly ParameterDescriptor[] {
    return this.ordered
  }

  get count(): number {
    return this.ordered.length
  }
}

/**
 * @jdxi-sysex/midi-backend-node
 *
 * Node.js SysEx transport using the jzz library.
 *
 * Requirements:
 * - Node.js 20+
 * - jzz package installed
 */

import {
  createIdentityRequest,
  createParameterCatalog,
  isIdentityReply,
  JDXI_DEVICE_ID,
  parseIdentityReply,
  SysExMessage,
  SysExParser,
  SYSEX_START
} from '@jdxi-sysex/core'
import type { IdentityInfo, ParameterCatalog, ParsedToneData } from '@jdxi-sysex/core'

import JZZ from 'jzz'

// =============================================================================
// Local Type Definitions
// =============================================================================

/**
 * MIDI port information.
 */
export interface MIDIPort {
  id: string
  name: string
  manufacturer?: string
}

/**
 * Options for creating a NodeSysExBackend.
 */
export interface NodeSysExBackendOptions {
  /** Device ID expected in DT1 replies (default: 0x10) */
  deviceId?: number
  /** Open the first output and input during init (default: true) */
  autoSelect?: boolean
  /** Log unresolved sections of inbound DT1 data (default: false) */
  debug?: boolean
}

export type ToneDataHandler = (data: ParsedToneData) => void
export type IdentityHandler = (identity: IdentityInfo) => void

// =============================================================================
// jzz Shapes
// =============================================================================

interface JzzEngine {
  info(): unknown
  openMidiOut(index: number): unknown
  openMidiIn(index: number): unknown
}

interface JzzOutput {
  send(bytes: number[]): unknown
  close(): unknown
}

interface JzzInput {
  connect(handler: (message: unknown) => void): unknown
  disconnect(): unknown
  close(): unknown
}

function isObject(value: unknown): value is object {
  return (typeof value === 'object' || typeof value === 'function') && value !== null
}

function isEngine(value: unknown): value is JzzEngine {
  return isObject(value) &&
    'info' in value && typeof value.info === 'function' &&
    'openMidiOut' in value && typeof value.openMidiOut === 'function' &&
    'openMidiIn' in value && typeof value.openMidiIn === 'function'
}

function isOutput(value: unknown): value is JzzOutput {
  return isObject(value) &&
    'send' in value && typeof value.send === 'function' &&
    'close' in value && typeof value.close === 'function'
}

function isInput(value: unknown): value is JzzInput {
  return isObject(value) &&
    'connect' in value && typeof value.connect === 'function' &&
    'disconnect' in value && typeof value.disconnect === 'function' &&
    'close' in value && typeof value.close === 'function'
}

/** jzz MIDI messages are array-like, not arrays */
function toBytes(message: unknown): number[] | null {
  if (!isObject(message) || !('length' in message) || typeof message.length !== 'number') return null
  const bytes: number[] = []
  for (let i = 0; i < message.length; i++) {
    const byte: unknown = Reflect.get(message, i)
    if (typeof byte !== 'number') return null
    bytes.push(byte)
  }
  return bytes
}

function portList(info: unknown, key: 'inputs' | 'outputs', label: string): MIDIPort[] {
  if (!isObject(info) || !(key in info)) return []
  const ports: unknown = Reflect.get(info, key)
  if (!Array.isArray(ports)) return []

  return ports.map((port: unknown, index: number): MIDIPort => {
    const name: unknown = isObject(port) ? Reflect.get(port, 'name') : undefined
    const manufacturer: unknown = isObject(port) ? Reflect.get(port, 'manufacturer') : undefined
    return {
      id: String(index),
      name: typeof name === 'string' && name ? name : `${label} ${index}`,
      manufacturer: typeof manufacturer === 'string' && manufacturer ? manufacturer : undefined
    }
  })
}

// =============================================================================
// NodeSysExBackend
// =============================================================================

/**
 * Sends composed SysEx to a JD-Xi and routes its replies.
 *
 * Inbound identity replies go to `onIdentity` handlers, DT1 data goes
 * through `SysExParser` to `onToneData` handlers. Everything else is ignored.
 */
export class NodeSysExBackend {
  // jzz state
  private midi: JzzEngine | null = null
  private midiOutput: JzzOutput | null = null
  private midiInput: JzzInput | null = null

  private readonly parser: SysExParser
  private readonly autoSelect: boolean

  private toneHandlers: Set<ToneDataHandler> = new Set()
  private identityHandlers: Set<IdentityHandler> = new Set()

  // State
  private disposed: boolean = false
  private initialized: boolean = false

  private selectedOutput: MIDIPort | null = null
  private selectedInput: MIDIPort | null = null

  private readonly handleMessage = (message: unknown): void => {
    const bytes = toBytes(message)
    if (!bytes || bytes[0] !== SYSEX_START) return
    this.receive(bytes)
  }

  constructor(
    options: NodeSysExBackendOptions = {},
    catalog: ParameterCatalog = createParameterCatalog()
  ) {
    this.autoSelect = options.autoSelect ?? true
    this.parser = new SysExParser(catalog, {
      deviceId: options.deviceId ?? JDXI_DEVICE_ID,
      debug: options.debug ?? false
    })
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start the jzz engine and, unless disabled, open the first ports.
   *
   * @returns True when an output is open
   */
  async init(): Promise<boolean> {
    if (this.initialized) return this.midiOutput !== null

    try {
      const engine = await this.engine()
      if (!engine) {
        this.initialized = true
        return false
      }

      if (this.autoSelect) {
        const outputs = await this.listOutputs()
        if (outputs.length > 0) {
          await this.selectOutput(outputs[0].id)
          console.log(`NodeSysExBackend: Using output "${outputs[0].name}"`)
        } else {
          console.warn('NodeSysExBackend: No MIDI outputs available')
        }

        const inputs = await this.listInputs()
        if (inputs.length > 0) {
          await this.selectInput(inputs[0].id)
          console.log(`NodeSysExBackend: Using input "${inputs[0].name}"`)
        }
      }

      this.initialized = true
      return this.midiOutput !== null
    } catch (error) {
      console.warn('NodeSysExBackend: JZZ initialization failed:', error)
      this.initialized = true
      return false
    }
  }

  /**
   * Close ports and drop handlers.
   */
  dispose(): void {
    if (this.disposed) return

    try {
      this.midiInput?.disconnect()
      this.midiInput?.close()
      this.midiOutput?.close()
    } catch (error) {
      console.warn('NodeSysExBackend: Failed to close MIDI ports:', error)
    }

    this.midiOutput = null
    this.midiInput = null
    this.midi = null
    this.selectedOutput = null
    this.selectedInput = null
    this.toneHandlers.clear()
    this.identityHandlers.clear()
    this.disposed = true
  }

  isReady(): boolean {
    return this.initialized && !this.disposed && this.midiOutput !== null
  }

  // ===========================================================================
  // Ports
  // ===========================================================================

  async listOutputs(): Promise<MIDIPort[]> {
    const engine = await this.engine()
    return engine ? portList(engine.info(), 'outputs', 'Output') : []
  }

  async listInputs(): Promise<MIDIPort[]> {
    const engine = await this.engine()
    return engine ? portList(engine.info(), 'inputs', 'Input') : []
  }

  /**
   * Select a MIDI output by port ID.
   */
  async selectOutput(id: string): Promise<boolean> {
    const engine = await this.engine()
    if (!engine) return false

    const port = (await this.listOutputs()).find(o => o.id === id)
    if (!port) return false

    try {
      const output: unknown = engine.openMidiOut(parseInt(id, 10))
      if (!isOutput(output)) {
        console.warn(`NodeSysExBackend: Output "${port.name}" did not open`)
        return false
      }
      this.midiOutput?.close()
      this.midiOutput = output
      this.selectedOutput = port
      return true
    } catch (error) {
      console.warn('NodeSysExBackend: Failed to open MIDI output:', error)
      return false
    }
  }

  /**
   * Select a MIDI input by port ID and start listening on it.
   */
  async selectInput(id: string): Promise<boolean> {
    const engine = await this.engine()
    if (!engine) return false

    const port = (await this.listInputs()).find(i => i.id === id)
    if (!port) return false

    try {
      const input: unknown = engine.openMidiIn(parseInt(id, 10))
      if (!isInput(input)) {
        console.warn(`NodeSysExBackend: Input "${port.name}" did not open`)
        return false
      }
      if (this.midiInput) {
        this.midiInput.disconnect()
        this.midiInput.close()
      }
      input.connect(this.handleMessage)
      this.midiInput = input
      this.selectedInput = port
      return true
    } catch (error) {
      console.warn('NodeSysExBackend: Failed to open MIDI input:', error)
      return false
    }
  }

  getSelectedOutput(): MIDIPort | null {
    return this.selectedOutput
  }

  getSelectedInput(): MIDIPort | null {
    return this.selectedInput
  }

  // ===========================================================================
  // Messaging
  // ===========================================================================

  /**
   * Send a composed message or raw bytes.
   *
   * @returns False when no output is open or the send failed
   */
  send(message: SysExMessage | readonly number[]): boolean {
    if (this.disposed || !this.midiOutput) return false

    const bytes = message instanceof SysExMessage ? message.toBytes() : [...message]
    try {
      this.midiOutput.send(bytes)
      return true
    } catch (error) {
      console.error('NodeSysExBackend: Send failed:', error)
      return false
    }
  }

  /**
   * Broadcast an Identity Request. Replies reach `onIdentity` handlers.
   */
  requestIdentity(): boolean {
    return this.send(createIdentityRequest())
  }

  /**
   * @returns Unsubscribe function
   */
  onToneData(handler: ToneDataHandler): () => void {
    this.toneHandlers.add(handler)
    return () => {
      this.toneHandlers.delete(handler)
    }
  }

  /**
   * @returns Unsubscribe function
   */
  onIdentity(handler: IdentityHandler): () => void {
    this.identityHandlers.add(handler)
    return () => {
      this.identityHandlers.delete(handler)
    }
  }

  /**
   * Route one inbound SysEx message. Called by the input port; public so
   * recorded dumps can be replayed through the same handlers.
   */
  receive(bytes: readonly number[]): void {
    if (this.disposed) return

    if (isIdentityReply(bytes)) {
      const identity = parseIdentityReply(bytes)
      if (!identity.ok) {
        console.warn('NodeSysExBackend: Bad identity reply:', identity.error.message)
        return
      }
      for (const handler of this.identityHandlers) handler(identity.value)
      return
    }

    const parsed = this.parser.parse(bytes)
    if (!parsed.ok) {
      console.warn('NodeSysExBackend: Dropped SysEx message:', parsed.error.message)
      return
    }
    for (const handler of this.toneHandlers) handler(parsed.value)
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async engine(): Promise<JzzEngine | null> {
    if (this.midi) return this.midi
    try {
      const engine: unknown = await JZZ({ sysex: true })
      if (!isEngine(engine)) {
        console.warn('NodeSysExBackend: JZZ returned no MIDI engine')
        return null
      }
      this.midi = engine
      return engine
    } catch (error) {
      console.warn('NodeSysExBackend: JZZ is unavailable:', error)
      return null
    }
  }
}

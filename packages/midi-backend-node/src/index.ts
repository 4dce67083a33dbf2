/**
 * @jdxi-sysex/midi-backend-node
 *
 * Node.js SysEx transport using the jzz library.
 * Sends messages built by @jdxi-sysex/core and parses the replies.
 */

export { NodeSysExBackend } from './NodeSysExBackend'
export type { MIDIPort, NodeSysExBackendOptions, ToneDataHandler, IdentityHandler } from './NodeSysExBackend'

export type { RunTransport } from './transport.js';
export { RunClient } from './http-client.js';
export type { RunClientOptions } from './http-client.js';
export { MemoryTransport, NoopTransport } from './memory-transport.js';
export type { RecordedCall } from './memory-transport.js';

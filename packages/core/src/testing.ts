/**
 * Test-support entry point (`@runtrail/core/testing`). Nothing here is
 * needed on a production path.
 */
export { resetSettings } from './settings.js';
export { MemoryTransport, NoopTransport } from '@runtrail/client';
export type { RecordedCall } from '@runtrail/client';

/**
 * @datastore-flex/datastore - Datastore port with in-memory and Google Cloud
 * Datastore adapters
 *
 * ## Usage
 *
 * ```typescript
 * import { keyToString } from '@datastore-flex/datastore';
 * import type { Datastore, Entity } from '@datastore-flex/datastore';
 * import { CloudDatastore } from '@datastore-flex/datastore/cloud';
 * import { MemoryDatastore } from '@datastore-flex/datastore/memory';
 * ```
 */

export * from "./core/index.js";

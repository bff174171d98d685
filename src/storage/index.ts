export type { DurableStore, SaveResult, SnapshotRecord } from './durableStore.js';
export { MemoryStore } from './memoryStore.js';
export { decodeSnapshot, encodeSnapshot, type EncodedSnapshot } from './snapshotCodec.js';
export { getSupabaseClient } from './supabase.js';
export { SupabaseStore, SupabaseStoreError, type SupabaseStoreOptions } from './supabaseStore.js';

import path from 'node:path';
import type { Env } from '../env.js';
import { FileSnapshotStore } from './fileSnapshotStore.js';
import { FirestoreSnapshotStore } from './firestoreSnapshotStore.js';
import type { SnapshotStore } from './snapshotStore.js';

export type { SnapshotStore } from './snapshotStore.js';

export function createSnapshotStore(env: Pick<Env, 'SNAPSHOT_STORE' | 'DATA_DIR'>): SnapshotStore {
  if (env.SNAPSHOT_STORE === 'firestore') return new FirestoreSnapshotStore();
  return new FileSnapshotStore(path.resolve(env.DATA_DIR));
}

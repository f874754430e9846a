// indexeddbshim ships no type declarations and has no @types package.
declare module 'indexeddbshim' {
  import type { DexieOptions } from 'dexie';

  export interface ShimConfig {
    checkOrigin?: boolean;
    databaseBasePath?: string;
    sysDatabaseBasePath?: string;
  }

  export interface ShimTarget {
    indexedDB?: DexieOptions['indexedDB'];
    IDBKeyRange?: DexieOptions['IDBKeyRange'];
  }

  export default function setGlobalVars(target: ShimTarget, config?: ShimConfig): ShimTarget;
}

/**
 * Holds at most one entry and ignores the argument tuple entirely.
 * Suited to zero-argument (or argument-insensitive) functions.
 */
export type SingleSlotStorageKind = "single-slot"

/**
 * Maps derived keys to entries. May be shared between several caches.
 */
export type MapStorageKind = "map"

export type StorageKind = SingleSlotStorageKind | MapStorageKind

export const storageKinds = ["single-slot", "map"] as const satisfies readonly StorageKind[]

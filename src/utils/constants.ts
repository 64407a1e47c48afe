export const UNASSIGNED = -1;

// FNV-1a hash constants (used by BitSet)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// State value used by apps that never declare their own states
export const DEFAULT_STATE = "default";

export const DEFAULT_APP_NAME = "app";

// Generation a system starts from: it has seen no archetype yet
export const INITIAL_ARCHETYPE_GENERATION = 0;

// Entity generation
export const INITIAL_GENERATION = 0;

// Change tick the store starts counting from
export const INITIAL_CHANGE_TICK = 1;

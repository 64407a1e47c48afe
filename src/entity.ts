/***
 * Entity — Packed generational ID (20-bit index | 12-bit generation).
 *
 * A slot's generation is bumped when its entity is despawned, so an old
 * ID that still points at the slot is detected as dead.
 *
 * Layout: [generation:12][index:20]
 *
 *   create_entity_id(index, gen) → (gen << 20) | index
 *   get_entity_index(id)         → id & 0xFFFFF
 *   get_entity_generation(id)    → (id >>> 20) & 0xFFF
 *
 ***/

import { type Brand, unsafe_cast } from "type_primitives";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

export type EntityID = Brand<number, "entity_id">;

export const INDEX_BITS = 20;
export const INDEX_MASK = (1 << INDEX_BITS) - 1;
export const MAX_INDEX = INDEX_MASK;
export const MAX_GENERATION = (1 << (32 - INDEX_BITS)) - 1;

export const create_entity_id = (
  index: number,
  generation: number,
): EntityID => {
  if (__DEV__) {
    if (index < 0 || index > MAX_INDEX) {
      throw new SchedulerError(SCHEDULER_ERROR.EID_MAX_INDEX_OVERFLOW);
    }
    if (generation < 0 || generation > MAX_GENERATION) {
      throw new SchedulerError(SCHEDULER_ERROR.EID_MAX_GEN_OVERFLOW);
    }
  }
  // >>> 0 keeps the id positive when the generation reaches the sign bit
  return unsafe_cast<EntityID>(((generation << INDEX_BITS) | index) >>> 0);
};

export const get_entity_index = (id: EntityID): number => id & INDEX_MASK;

export const get_entity_generation = (id: EntityID): number =>
  (id >>> INDEX_BITS) & MAX_GENERATION;

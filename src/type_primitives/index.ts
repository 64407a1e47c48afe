export type { Brand } from "./brand";
export {
  assert,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
export { BitSet } from "./bitset/bitset";

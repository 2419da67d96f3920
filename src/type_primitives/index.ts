export type { Brand } from "./brand";
export {
  validate_and_cast,
  is_non_negative_integer,
  is_positive_integer,
  is_non_negative_finite,
} from "./assertions";
export { TypeError, TYPE_ERROR } from "./error";
export { BitSet } from "./bitset/bitset";

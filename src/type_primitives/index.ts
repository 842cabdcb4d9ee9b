export { assert, is_non_null, unsafe_cast } from "./assertions";
export { TypeError, TYPE_ERROR } from "./error";

export { ErrorKind, success, failure } from "./types.ts";
export type { Envelope, Success, Failure } from "./types.ts";
export { decode, truncateRaw, DEFAULT_MAX_DEPTH, ERROR_MARKERS } from "./decode.ts";
export type { DecodeOptions, PayloadSchema } from "./decode.ts";

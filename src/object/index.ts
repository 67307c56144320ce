/**
 * Object module exports.
 */

export {
  ObjectType,
  KestrelNull,
  KestrelBoolean,
  KestrelInteger,
  KestrelFunction,
  NULL,
  TRUE,
  FALSE,
  toBoolean,
  isTruthy,
  isInteger,
} from "./object.js";
export type { KestrelObject } from "./object.js";

/**
 * Pass system and the allocation pipeline
 */

export * from "./pass.js";
export { allocate, allocateByClass } from "./allocate.js";

/**
 * Analysis utilities
 */

export { Formatter } from "./formatter.js";

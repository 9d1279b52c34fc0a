export { formatError } from "./format-error.js";
export { sleep, type Wait } from "./sleep.js";

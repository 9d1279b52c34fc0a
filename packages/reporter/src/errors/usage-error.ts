import { ReporterError } from "./reporter-error.js";

/**
 * Thrown for unknown command line options or a flag missing its value
 */
export class UsageError extends ReporterError {}

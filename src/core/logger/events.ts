/**
 * Logger event definitions.
 */
import type { LogLevel } from './types.js';

export interface LoggerEvents {
    /** Logger began capturing events */
    'logger:started': { file: string | null; level: LogLevel };

    /** File output moved to a new path (null closes the file) */
    'logger:redirected': { file: string | null; previous: string | null };
}

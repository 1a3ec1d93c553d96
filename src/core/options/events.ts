/**
 * Options module event definitions.
 *
 * Events emitted by OptionsRegistry for declarations and writes.
 */
import type { OptionKind, RejectReason } from './types.js';

/**
 * Option events emitted by the options module.
 */
export interface OptionsEvents {
    /** Option declared (or redeclared) under a name */
    'option:declared': {
        name: string;
        kind: OptionKind;
        rank: number;
    };

    /** Accepted write, after the hook has run */
    'option:changed': {
        name: string;
        kind: OptionKind;
        value: string;
    };

    /** Write turned down, value unchanged */
    'option:rejected': {
        name: string;
        value: string;
        reason: RejectReason;
    };

    /** All options restored to their defaults */
    'option:reset': {
        count: number;
    };
}

/**
 * Engine option declarations.
 *
 * The fixed set of options the engine exposes, in display order. Hooks
 * are bound to whichever subsystems the caller supplies; an option whose
 * subsystem is missing is declared without a hook.
 */
import {
    clearOnChange,
    loadOnChange,
    redirectLogOnChange,
    reinitializeOnChange,
    resizeOnChange,
    scaleOnChange,
} from './capabilities.js';
import type {
    Clearable,
    LogTarget,
    PathLoadable,
    Reinitializable,
    Resizable,
    ThreadPoolScalable,
} from './capabilities.js';
import { buttonOption, checkOption, comboOption, spinOption, stringOption } from './option.js';
import { OptionsRegistry } from './registry.js';
import type { OptionsRegistryOptions } from './registry.js';
import { EMPTY_PLACEHOLDER } from './types.js';
import type { OptionHook } from './types.js';

/**
 * Largest transposition table, in megabytes.
 */
export const MAX_HASH_MB = 33554432;

/**
 * Most search threads.
 */
export const MAX_THREADS = 512;

/**
 * Network file loaded when EvalFile is left alone.
 */
export const DEFAULT_EVAL_FILE = 'nn-default.nnue';

/**
 * Experience database file name.
 */
export const DEFAULT_EXPERIENCE_FILE = 'engine.exp';

/**
 * Subsystems that react to option changes.
 */
export interface EngineSubsystems {

    /** Search state, wiped by Clear Hash */
    search: Clearable;

    /** Transposition table, sized by Hash */
    hashTable: Resizable;

    /** Search threads */
    threads: ThreadPoolScalable;

    /** Debug log, moved by Debug Log File */
    debugLog: LogTarget;

    /** Endgame tablebases, loaded from SyzygyPath */
    tablebases: PathLoadable;

    /** Opening books, loaded from Book1 File and Book2 File */
    book1: PathLoadable;
    book2: PathLoadable;

    /** Experience database */
    experience: Reinitializable;

    /** Evaluation network */
    evaluator: Reinitializable;
}

/**
 * Bind a hook when the subsystem is present.
 */
function bind<T>(target: T | undefined, adapter: (target: T) => OptionHook): OptionHook | undefined {

    return target === undefined ? undefined : adapter(target);

}

/**
 * Declare the engine's options on a registry.
 *
 * @example
 * ```typescript
 * const registry = new OptionsRegistry()
 *
 * declareEngineOptions(registry, { hashTable: tt, threads: pool })
 * registry.set('Hash', '256') // tt.resize(256)
 * ```
 */
export function declareEngineOptions(
    registry: OptionsRegistry,
    subsystems: Partial<EngineSubsystems> = {},
): OptionsRegistry {

    const {
        search,
        hashTable,
        threads,
        debugLog,
        tablebases,
        book1,
        book2,
        experience,
        evaluator,
    } = subsystems;

    registry.declare('Debug Log File', stringOption('', bind(debugLog, redirectLogOnChange)));
    registry.declare('Contempt', spinOption(24, -100, 100));
    registry.declare('Analysis Contempt', comboOption('Both var Off var White var Black var Both', 'Both'));
    registry.declare('Threads', spinOption(1, 1, MAX_THREADS, bind(threads, scaleOnChange)));
    registry.declare('Hash', spinOption(16, 1, MAX_HASH_MB, bind(hashTable, resizeOnChange)));
    registry.declare('Clear Hash', buttonOption(bind(search, clearOnChange)));
    registry.declare('Ponder', checkOption(false));
    registry.declare('MultiPV', spinOption(1, 1, 500));
    registry.declare('Skill Level', spinOption(20, 0, 20));
    registry.declare('Move Overhead', spinOption(10, 0, 5000));
    registry.declare('Minimum Thinking Time', spinOption(5, 0, 5000));
    registry.declare('Slow Mover', spinOption(100, 10, 1000));
    registry.declare('nodestime', spinOption(0, 0, 10000));
    registry.declare('UCI_Chess960', checkOption(false));
    registry.declare('UCI_AnalyseMode', checkOption(false));
    registry.declare('UCI_LimitStrength', checkOption(false));
    registry.declare('UCI_Elo', spinOption(1350, 1350, 2850));
    registry.declare('UCI_ShowWDL', checkOption(false));

    // Tablebases
    registry.declare('SyzygyPath', stringOption(EMPTY_PLACEHOLDER, bind(tablebases, loadOnChange)));
    registry.declare('SyzygyProbeDepth', spinOption(1, 1, 100));
    registry.declare('Syzygy50MoveRule', checkOption(true));
    registry.declare('SyzygyProbeLimit', spinOption(7, 0, 7));

    // Opening books
    registry.declare('Book1', checkOption(false));
    registry.declare('Book1 File', stringOption(EMPTY_PLACEHOLDER, bind(book1, loadOnChange)));
    registry.declare('Book1 BestBookMove', checkOption(true));
    registry.declare('Book1 Depth', spinOption(100, 1, 350));
    registry.declare('Book2', checkOption(false));
    registry.declare('Book2 File', stringOption(EMPTY_PLACEHOLDER, bind(book2, loadOnChange)));
    registry.declare('Book2 BestBookMove', checkOption(true));
    registry.declare('Book2 Depth', spinOption(100, 1, 350));

    // Experience
    registry.declare('Experience Enabled', checkOption(true, bind(experience, reinitializeOnChange)));
    registry.declare('Experience File', stringOption(DEFAULT_EXPERIENCE_FILE, bind(experience, reinitializeOnChange)));
    registry.declare('Experience Readonly', checkOption(false));
    registry.declare('Experience Book', checkOption(false));
    registry.declare('Experience Book Best Move', checkOption(true));
    registry.declare('Experience Book Eval Importance', spinOption(5, 0, 10));
    registry.declare('Experience Book Max Moves', spinOption(16, 1, 100));

    // Evaluation
    registry.declare('EvalFile', stringOption(DEFAULT_EVAL_FILE, bind(evaluator, reinitializeOnChange)));
    registry.declare('Use NNUE Evaluation', checkOption(true, bind(evaluator, reinitializeOnChange)));
    registry.declare('Use Classical Evaluation', checkOption(true));

    return registry;

}

/**
 * Create a registry holding the engine's options.
 */
export function createEngineOptions(
    subsystems: Partial<EngineSubsystems> = {},
    options: OptionsRegistryOptions = {},
): OptionsRegistry {

    return declareEngineOptions(new OptionsRegistry(options), subsystems);

}

/**
 * Options Module
 *
 * Named, typed engine options with validation and change hooks.
 * Options are declared once at startup, then read and written by
 * name for the life of the process.
 */

// Events
export type { OptionsEvents } from './events.js';

// Types
export type {
    OptionKind,
    StringState,
    CheckState,
    SpinState,
    ComboState,
    ButtonState,
    OptionState,
    OptionHook,
    RejectReason,
    WriteResult,
    OptionDescriptor,
} from './types.js';

export { OPTION_KINDS, COMBO_SEPARATOR, EMPTY_PLACEHOLDER } from './types.js';

// Errors
export {
    OptionNotFoundError,
    OptionAccessError,
    OptionDeclarationError,
    OptionRejectedError,
} from './errors.js';

// Comparison
export { compareCaseInsensitive, equalsCaseInsensitive } from './compare.js';

// Schemas and Parsing
export {
    CheckTextSchema,
    SpinTextSchema,
    parseCheckText,
    parseSpinText,
    splitChoices,
    validateSpinDeclaration,
    validateComboDeclaration,
} from './schema.js';

export type { SpinDeclaration, ComboDeclaration } from './schema.js';

// Options
export {
    EngineOption,
    stringOption,
    checkOption,
    spinOption,
    comboOption,
    buttonOption,
} from './option.js';

export type { EngineOptionInit } from './option.js';

// Registry
export { OptionsRegistry } from './registry.js';

export type { OptionsRegistryOptions } from './registry.js';

// Display
export { formatOption, formatRegistry, describeOption, describeRegistry } from './format.js';

// Capabilities
export {
    pathOf,
    resizeOnChange,
    scaleOnChange,
    reinitializeOnChange,
    clearOnChange,
    loadOnChange,
    redirectLogOnChange,
} from './capabilities.js';

export type {
    Resizable,
    ThreadPoolScalable,
    Reinitializable,
    Clearable,
    PathLoadable,
    LogTarget,
} from './capabilities.js';

// Engine declarations
export {
    MAX_HASH_MB,
    MAX_THREADS,
    DEFAULT_EVAL_FILE,
    DEFAULT_EXPERIENCE_FILE,
    declareEngineOptions,
    createEngineOptions,
} from './engine.js';

export type { EngineSubsystems } from './engine.js';

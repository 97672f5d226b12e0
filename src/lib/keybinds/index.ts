/**
 * Keybind reconciliation module.
 * Re-exports all public APIs for normalizing, checking and merging keybinds.
 */

// Types
export type {
    Conflict,
    ConflictSeverity,
    ConflictType,
    CollisionRegistry,
    Difficulty,
    Frequency,
    Keybind,
    KeybindInput,
    KeybindSource,
    KeybindSuggestion,
    MergedConfiguration,
    MergeOptions,
    MergeStatistics,
    Modifier,
    NormalizedKey,
    ReservedKeyPolicy,
    RuleKind,
    RuleViolation,
    SuggestionKind,
    ToolLayers,
    ToolResult,
    ValidationResult,
} from './types'
export { conflictTypes, keybindSources, modifierOrder, PriorityTier } from './types'

// Errors
export { ConfigFileError, InvalidKeybindError } from './errors'

// Normalization
export {
    composeCanonical,
    formatKey,
    getSystemReservedKeys,
    isSystemReserved,
    normalize,
    normalizeBaseKey,
    resolveModifierAlias,
    sameKey,
    SEQUENCE_SEPARATOR,
    type KeyFormatStyle,
} from './key-normalizer'

// Context scopes
export { contextsOverlap, GLOBAL_CONTEXT, hasOverlappingContexts, type ContextScoped } from './context-scope'

// Conflict detection
export {
    buildRegistry,
    conflictSignature,
    defaultDetectorOptions,
    detectAllCollisions,
    detectKeybindCollisions,
    lookupKeybinds,
    type DetectorOptions,
    type RegistryScope,
} from './collision-detector'

// Suggestions
export { generateKeyAlternatives, getAdjacentKeys } from './key-alternatives'
export {
    findAlternativeKeys,
    generateSuggestions,
    rankSuggestions,
    scoreConfidence,
    suggestOrganization,
    type SuggestionOptions,
} from './suggestion-engine'

// Merge
export {
    compareForResolution,
    defaultMergeOptions,
    groupIntoLayers,
    merge,
    MERGED_CONFIGURATION_VERSION,
    mergeToolLayers,
    prepareKeybind,
} from './keybind-merger'

// Validation
export { buildValidationResult, validateConfiguration, type ValidateOptions } from './validation'
export {
    applyRules,
    loadRulesFile,
    parseRulesFile,
    rulesFileSchema,
    validationRuleSchema,
    type ValidationRule,
} from './validation-rules'
export { formatReport, isReportFormat, reportFormats, type ReportFormat } from './report-format'

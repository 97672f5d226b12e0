/**
 * Types for the keybind reconciliation engine.
 * Extractor records come in as KeybindInput, the engine works on Keybind.
 */

// ============================================================================
// Sources and ranking
// ============================================================================

export const keybindSources = ['system', 'default', 'user', 'generated'] as const
export type KeybindSource = (typeof keybindSources)[number]

/** Numeric rank derived from the source. Lower wins among records of equal standing. */
export const PriorityTier = {
    SystemReserved: 0,
    ToolDefault: 1,
    UserOverride: 2,
    Generated: 3,
} as const
export type PriorityTier = (typeof PriorityTier)[keyof typeof PriorityTier]

export type Frequency = 'high' | 'medium' | 'low'
export type Difficulty = 'beginner' | 'intermediate' | 'advanced'

// ============================================================================
// Keys
// ============================================================================

/** Canonical modifier names, listed in canonical order */
export const modifierOrder = ['ctrl', 'option', 'shift', 'meta'] as const
export type Modifier = (typeof modifierOrder)[number]

/** Result of normalizing one textual key specification */
export interface NormalizedKey {
    /** Base key ('A', 'Space', 'F1'); empty for a sequence */
    key: string
    /** Modifiers in canonical order; empty for a sequence */
    modifiers: Modifier[]
    /** Canonical strings of each step, for multi-key sequences */
    sequence?: string[]
    /** The string every equality and collision check compares */
    canonical: string
}

// ============================================================================
// Records
// ============================================================================

/** A record as an extractor hands it over. Only id, tool, key, context and source are required. */
export interface KeybindInput {
    id: string
    tool: string
    /** Raw key text in the origin tool's notation (for example 'C-b c' or '⌘⇧A') */
    key: string
    action?: string
    context: string
    source: KeybindSource
    category?: string
    tags?: string[]
    frequency?: Frequency
    difficulty?: Difficulty
    sourceFile?: string
    sourceLine?: number
    disabled?: boolean
    conflicts?: string[]
}

/** A record inside the engine, carrying its canonical key and resolution state */
export interface Keybind {
    id: string
    tool: string
    key: string
    action: string
    context: string
    source: KeybindSource
    priority: PriorityTier
    canonical: string
    baseKey: string
    modifiers: Modifier[]
    sequence?: string[]
    category?: string
    tags?: string[]
    frequency?: Frequency
    difficulty?: Difficulty
    sourceFile?: string
    sourceLine?: number
    disabled: boolean
    disabledReason?: string
    /** Winner: ids it beat. Loser: the id of the record that holds its slot. */
    conflicts: string[]
}

// ============================================================================
// Conflicts
// ============================================================================

export type ConflictSeverity = 'error' | 'warning' | 'info'

export const conflictTypes = ['hard', 'soft', 'shadow', 'cross-tool', 'system'] as const
export type ConflictType = (typeof conflictTypes)[number]

export interface Conflict {
    /** Dedup signature: type, canonical key and sorted participant ids */
    id: string
    severity: ConflictSeverity
    type: ConflictType
    key: string
    keybinds: string[]
    contexts: string[]
    tools: string[]
    message: string
    /** Free canonical keys that could replace the losing assignment */
    suggestions: string[]
}

/** Three lookups, rebuilt from scratch for every batch */
export interface CollisionRegistry {
    globalKeys: Map<string, string[]>
    contextKeys: Map<string, Map<string, string[]>>
    toolKeys: Map<string, Map<string, string[]>>
}

// ============================================================================
// Suggestions and validation
// ============================================================================

export type SuggestionKind = 'conflict-resolution' | 'complexity' | 'modifier-pattern' | 'ergonomics' | 'organization'

export interface KeybindSuggestion {
    id: string
    kind: SuggestionKind
    tool?: string
    keybindIds: string[]
    action: string
    currentKey?: string
    suggestedKey?: string
    alternatives: string[]
    reason: string
    /** 0..1 */
    confidence: number
}

export type RuleKind = 'required-modifiers' | 'forbidden-keys' | 'context-isolation' | 'ergonomics'

export interface RuleViolation {
    id: string
    rule: RuleKind
    severity: ConflictSeverity
    key: string
    keybinds: string[]
    contexts: string[]
    tools: string[]
    message: string
    suggestions: string[]
}

export interface ValidationResult {
    valid: boolean
    errors: Conflict[]
    warnings: Conflict[]
    info: Conflict[]
    violations: RuleViolation[]
    suggestions: KeybindSuggestion[]
}

// ============================================================================
// Merge input and output
// ============================================================================

/** Per-tool record sets, one array per source. Every layer is optional. */
export interface ToolLayers {
    system?: KeybindInput[]
    defaults?: KeybindInput[]
    user?: KeybindInput[]
    generated?: KeybindInput[]
}

export type ReservedKeyPolicy = 'absolute' | 'defer-to-overrides'

export interface MergeOptions {
    resolveConflicts: boolean
    prioritizeUserConfig: boolean
    allowSystemOverrides: boolean
    preserveDisabled: boolean
    generateSuggestions: boolean
    reservedKeyPolicy: ReservedKeyPolicy
    maxAlternatives: number
    maxModifiers: number
    patternConsistencyThreshold: number
}

export interface ToolResult {
    tool: string
    system: Keybind[]
    defaults: Keybind[]
    user: Keybind[]
    generated: Keybind[]
    conflicts: Conflict[]
    suggestions: KeybindSuggestion[]
}

export interface MergeStatistics {
    totalKeybinds: number
    enabled: number
    disabled: number
    byTool: Record<string, number>
    bySource: Record<KeybindSource, number>
    conflicts: Record<ConflictType, number>
}

export interface MergedConfiguration {
    version: string
    tools: Record<string, ToolResult>
    collisions: {
        global: Conflict[]
        contextual: Conflict[]
        resolved: Conflict[]
    }
    validation: ValidationResult
    statistics: MergeStatistics
}

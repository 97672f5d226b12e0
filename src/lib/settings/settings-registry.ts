/**
 * Settings registry - single source of truth for all engine settings.
 */

import type { SettingDefinition, SettingId, SettingsValues } from './types'
import { SettingValidationError } from './types'

// ============================================================================
// Defaults
// ============================================================================

const defaultSettings: SettingsValues = {
    'merge.resolveConflicts': true,
    'merge.prioritizeUserConfig': true,
    'merge.allowSystemOverrides': false,
    'merge.preserveDisabled': true,
    'merge.generateSuggestions': true,
    'detection.reservedKeyPolicy': 'absolute',
    'suggestions.maxAlternatives': 5,
    'suggestions.maxModifiers': 3,
    'suggestions.patternConsistencyThreshold': 0.6,
    'logging.verbose': false,
}

// ============================================================================
// Settings Definitions
// ============================================================================

export const settingsRegistry: SettingDefinition[] = [
    // ========================================================================
    // Merge
    // ========================================================================
    {
        id: 'merge.resolveConflicts',
        section: ['Merge'],
        label: 'Resolve conflicts',
        description:
            'Pick a winner for every hard collision. When off, hard collisions are reported and fail validation.',
        type: 'boolean',
        default: defaultSettings['merge.resolveConflicts'],
    },
    {
        id: 'merge.prioritizeUserConfig',
        section: ['Merge'],
        label: 'Prioritize user config',
        description: "Let a user's keybinding replace a tool default on the same key while layering.",
        type: 'boolean',
        default: defaultSettings['merge.prioritizeUserConfig'],
    },
    {
        id: 'merge.allowSystemOverrides',
        section: ['Merge'],
        label: 'Allow system overrides',
        description:
            'Let other layers replace system keybindings while layering. System-reserved keys stay protected regardless.',
        type: 'boolean',
        default: defaultSettings['merge.allowSystemOverrides'],
    },
    {
        id: 'merge.preserveDisabled',
        section: ['Merge'],
        label: 'Keep disabled keybindings',
        description: 'Keep keybindings that lost a conflict in the output, marked disabled.',
        type: 'boolean',
        default: defaultSettings['merge.preserveDisabled'],
    },
    {
        id: 'merge.generateSuggestions',
        section: ['Merge'],
        label: 'Generate suggestions',
        description: 'Suggest alternative keys for keybindings that lost a conflict or are hard to use.',
        type: 'boolean',
        default: defaultSettings['merge.generateSuggestions'],
    },

    // ========================================================================
    // Detection
    // ========================================================================
    {
        id: 'detection.reservedKeyPolicy',
        section: ['Detection'],
        label: 'Reserved key policy',
        description: 'How keybindings on system-reserved keys are reported. They are always disabled.',
        type: 'enum',
        default: defaultSettings['detection.reservedKeyPolicy'],
        constraints: {
            options: [
                { value: 'absolute', label: 'Absolute', description: 'Always report as an error' },
                {
                    value: 'defer-to-overrides',
                    label: 'Defer to overrides',
                    description: 'Report as a warning when system overrides are allowed',
                },
            ],
        },
    },

    // ========================================================================
    // Suggestions
    // ========================================================================
    {
        id: 'suggestions.maxAlternatives',
        section: ['Suggestions'],
        label: 'Alternatives per suggestion',
        description: 'How many alternative keys to offer for one keybinding.',
        type: 'number',
        default: defaultSettings['suggestions.maxAlternatives'],
        constraints: { min: 1, max: 10, integer: true },
    },
    {
        id: 'suggestions.maxModifiers',
        section: ['Suggestions'],
        label: 'Maximum modifiers',
        description: 'Keybindings with more modifiers than this get a simplification suggestion.',
        type: 'number',
        default: defaultSettings['suggestions.maxModifiers'],
        constraints: { min: 1, max: 4, integer: true },
    },
    {
        id: 'suggestions.patternConsistencyThreshold',
        section: ['Suggestions'],
        label: 'Modifier pattern consistency',
        description: "Share of a tool's keybindings that should use its most common modifier combination.",
        type: 'number',
        default: defaultSettings['suggestions.patternConsistencyThreshold'],
        constraints: { min: 0, max: 1 },
    },

    // ========================================================================
    // Logging
    // ========================================================================
    {
        id: 'logging.verbose',
        section: ['Logging'],
        label: 'Verbose logging',
        description: 'Log debug details of layering, detection and resolution.',
        type: 'boolean',
        default: defaultSettings['logging.verbose'],
    },
]

// ============================================================================
// Lookup
// ============================================================================

const registryMap = new Map<string, SettingDefinition>(settingsRegistry.map((s) => [s.id, s]))

export function isSettingId(id: string): id is SettingId {
    return registryMap.has(id)
}

/**
 * Get a setting definition by ID.
 */
export function getSettingDefinition(id: string): SettingDefinition | undefined {
    return registryMap.get(id)
}

/**
 * Get the default value for a setting.
 */
export function getDefaultValue<K extends SettingId>(id: K): SettingsValues[K] {
    return defaultSettings[id]
}

/** A fresh copy of every default */
export function getDefaultSettings(): SettingsValues {
    return { ...defaultSettings }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a value against a setting's constraints.
 * Throws SettingValidationError if invalid.
 */
export function validateSettingValue(id: string, value: unknown): void {
    const reason = findInvalidReason(id, value)
    if (reason !== null) {
        throw new SettingValidationError(id, reason)
    }
}

/** Type guard form of validateSettingValue */
export function isValidSettingValue<K extends SettingId>(id: K, value: unknown): value is SettingsValues[K] {
    return findInvalidReason(id, value) === null
}

function findInvalidReason(id: string, value: unknown): string | null {
    const def = registryMap.get(id)
    if (!def) {
        return 'Unknown setting'
    }

    switch (def.type) {
        case 'boolean':
            return typeof value === 'boolean' ? null : `Expected boolean, got ${typeof value}`

        case 'number':
            if (typeof value !== 'number') {
                return `Expected number, got ${typeof value}`
            }
            if (!Number.isFinite(value)) {
                return 'Value must be a finite number'
            }
            return findNumberConstraintViolation(value, def)

        case 'enum':
            return findEnumViolation(value, def)
    }
}

function findNumberConstraintViolation(value: number, def: SettingDefinition): string | null {
    const c = def.constraints
    if (!c) return null

    if (c.integer && !Number.isInteger(value)) {
        return `Value ${String(value)} must be a whole number`
    }
    if (c.min !== undefined && value < c.min) {
        return `Value ${String(value)} is below minimum ${String(c.min)}`
    }
    if (c.max !== undefined && value > c.max) {
        return `Value ${String(value)} exceeds maximum ${String(c.max)}`
    }
    return null
}

function findEnumViolation(value: unknown, def: SettingDefinition): string | null {
    const validValues = (def.constraints?.options ?? []).map((o) => o.value)

    if (typeof value === 'string' && validValues.includes(value)) {
        return null
    }

    return `Invalid value '${String(value)}'. Valid options: ${validValues.join(', ')}`
}

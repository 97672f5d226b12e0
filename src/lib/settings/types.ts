/**
 * Settings system type definitions.
 */

import type { ReservedKeyPolicy } from '$lib/keybinds/types'

// ============================================================================
// Core Types
// ============================================================================

export type SettingType = 'boolean' | 'number' | 'enum'

export interface EnumOption {
    value: string
    label: string
    description?: string
}

export interface SettingConstraints {
    // For 'number' type
    min?: number
    max?: number
    integer?: boolean

    // For 'enum' type
    options?: EnumOption[]
}

// ============================================================================
// Setting Value Types (for type-safe access)
// ============================================================================

export interface SettingsValues {
    // Merge
    'merge.resolveConflicts': boolean
    'merge.prioritizeUserConfig': boolean
    'merge.allowSystemOverrides': boolean
    'merge.preserveDisabled': boolean
    'merge.generateSuggestions': boolean

    // Detection
    'detection.reservedKeyPolicy': ReservedKeyPolicy

    // Suggestions
    'suggestions.maxAlternatives': number
    'suggestions.maxModifiers': number
    'suggestions.patternConsistencyThreshold': number

    // Logging
    'logging.verbose': boolean
}

export type SettingId = keyof SettingsValues

export interface SettingDefinition {
    // Identity
    id: SettingId
    section: string[]

    // Display
    label: string
    description: string

    // Type and constraints
    type: SettingType
    default: SettingsValues[SettingId]
    constraints?: SettingConstraints
}

// ============================================================================
// Errors
// ============================================================================

export class SettingValidationError extends Error {
    constructor(
        public settingId: string,
        public reason: string,
    ) {
        super(`Invalid value for setting '${settingId}': ${reason}`)
        this.name = 'SettingValidationError'
    }
}

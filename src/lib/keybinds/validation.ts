/**
 * Pass/fail validation of a batch, for gate-style use such as CI.
 */

import { getAppLogger } from '$lib/logger'
import { detectAllCollisions, type DetectorOptions } from './collision-detector'
import { suggestOrganization } from './suggestion-engine'
import type { Conflict, KeybindSuggestion, Keybind, RuleViolation, ValidationResult } from './types'
import { applyRules, type ValidationRule } from './validation-rules'

const log = getAppLogger('validation')

export interface ValidateOptions extends Partial<DetectorOptions> {
    rules?: readonly ValidationRule[]
}

export interface ValidationInputs {
    /** Ids of error conflicts that were resolved and no longer fail validation */
    resolvedIds?: ReadonlySet<string>
    violations?: readonly RuleViolation[]
    suggestions?: readonly KeybindSuggestion[]
}

/**
 * Split conflicts by severity. Valid means no unresolved error conflict and no error violation.
 */
export function buildValidationResult(conflicts: readonly Conflict[], inputs: ValidationInputs = {}): ValidationResult {
    const resolvedIds = inputs.resolvedIds ?? new Set<string>()
    const violations = [...(inputs.violations ?? [])]

    const errors = conflicts.filter((conflict) => conflict.severity === 'error' && !resolvedIds.has(conflict.id))
    const warnings = conflicts.filter((conflict) => conflict.severity === 'warning')
    const info = conflicts.filter((conflict) => conflict.severity === 'info')

    return {
        valid: errors.length === 0 && !violations.some((violation) => violation.severity === 'error'),
        errors,
        warnings,
        info,
        violations,
        suggestions: [...(inputs.suggestions ?? [])],
    }
}

/**
 * Detect conflicts in a batch, as given, and apply any custom rules. Nothing is resolved.
 */
export function validateConfiguration(batch: readonly Keybind[], options: ValidateOptions = {}): ValidationResult {
    const { rules = [], ...detectorOptions } = options
    const conflicts = detectAllCollisions(batch, detectorOptions)
    const result = buildValidationResult(conflicts, {
        violations: applyRules(batch, rules),
        suggestions: suggestOrganization(conflicts),
    })

    log.debug('Validated {count} keybinds: {errors} errors, {warnings} warnings, {violations} rule violations', {
        count: batch.length,
        errors: result.errors.length,
        warnings: result.warnings.length,
        violations: result.violations.length,
    })
    return result
}

/**
 * Remediation suggestions.
 *
 * Alternatives are only offered after probing them through the detector, so a suggested key
 * is always free in the batch it was computed for. Suggestions are heuristic and ranked; none is
 * claimed to be the optimal assignment.
 */

import { getAppLogger } from '$lib/logger'
import { detectKeybindCollisions, type DetectorOptions } from './collision-detector'
import { generateKeyAlternatives } from './key-alternatives'
import keyTables from './key-tables.json'
import { normalize } from './key-normalizer'
import type { Conflict, Keybind, KeybindSuggestion, SuggestionKind } from './types'

const log = getAppLogger('suggestions')

const awkwardKeys = new Set(keyTables.awkwardKeys)
const hardToReachKeys = new Set(keyTables.hardToReachKeys)
const easyKeys = new Set(keyTables.easyKeys)

/** Hard collisions above this count suggest reorganizing */
const HARD_COLLISION_LIMIT = 3
/** Cross-tool warnings above this count suggest standardizing modifiers */
const CROSS_TOOL_LIMIT = 5
/** Tools with fewer modified keybinds than this aren't checked for pattern consistency */
const MIN_PATTERN_SAMPLE = 3

export interface SuggestionOptions {
    maxAlternatives: number
    /** Modifier count above which a keybind is flagged as complex */
    maxModifiers: number
    /** Share of a tool's modified keybinds the dominant pattern must cover */
    patternConsistencyThreshold: number
    detector?: Partial<DetectorOptions>
}

export const defaultSuggestionOptions: SuggestionOptions = {
    maxAlternatives: 5,
    maxModifiers: 3,
    patternConsistencyThreshold: 0.6,
}

// ============================================================================
// Alternatives
// ============================================================================

/**
 * The first `limit` candidate keys that the detector reports no conflict for.
 */
export function findAlternativeKeys(
    keybind: Keybind,
    batch: readonly Keybind[],
    limit = defaultSuggestionOptions.maxAlternatives,
    detectorOptions: Partial<DetectorOptions> = {},
): string[] {
    const found: string[] = []

    for (const candidate of generateKeyAlternatives(normalize(keybind.canonical))) {
        if (found.length >= limit) break
        const probe = withCanonicalKey(keybind, candidate)
        if (detectKeybindCollisions(probe, batch, detectorOptions).length === 0) {
            found.push(candidate)
        }
    }

    return found
}

/** A copy of the record moved onto another key, enabled */
function withCanonicalKey(keybind: Keybind, canonical: string): Keybind {
    const normalized = normalize(canonical)
    const probe: Keybind = {
        ...keybind,
        key: canonical,
        canonical: normalized.canonical,
        baseKey: normalized.key,
        modifiers: normalized.modifiers,
        disabled: false,
        conflicts: [],
    }
    delete probe.disabledReason
    delete probe.sequence
    if (normalized.sequence) probe.sequence = normalized.sequence
    return probe
}

// ============================================================================
// Confidence
// ============================================================================

const baseConfidence: Record<SuggestionKind, number> = {
    'conflict-resolution': 0.5,
    complexity: 0.3,
    'modifier-pattern': 0.3,
    ergonomics: 0.4,
    organization: 0.5,
}

interface ConfidenceFactors {
    userSource?: boolean
    highFrequency?: boolean
    fromError?: boolean
}

/**
 * Heuristic confidence in [0, 1]: a base per kind plus bonuses for user-owned keybinds,
 * frequently used actions, and suggestions that fix an error.
 */
export function scoreConfidence(kind: SuggestionKind, factors: ConfidenceFactors = {}): number {
    let score = baseConfidence[kind]
    if (factors.userSource) score += 0.3
    if (factors.highFrequency) score += 0.2
    if (factors.fromError) score += 0.2
    return Math.min(1, Math.round(score * 100) / 100)
}

/** Confidence descending, then id */
export function rankSuggestions(suggestions: readonly KeybindSuggestion[]): KeybindSuggestion[] {
    return [...suggestions].sort((a, b) => {
        if (a.confidence !== b.confidence) return b.confidence - a.confidence
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
    })
}

// ============================================================================
// Suggestion kinds
// ============================================================================

/**
 * One suggestion per record that lost a resolved conflict, with free alternatives for it.
 */
export function suggestConflictResolutions(
    resolved: readonly Conflict[],
    batch: readonly Keybind[],
    options: SuggestionOptions = defaultSuggestionOptions,
): KeybindSuggestion[] {
    const byId = new Map(batch.map((keybind) => [keybind.id, keybind]))
    const suggestions = new Map<string, KeybindSuggestion>()

    for (const conflict of resolved) {
        for (const id of conflict.keybinds) {
            const loser = byId.get(id)
            if (!loser || !loser.disabled || suggestions.has(loser.id)) continue

            const alternatives = findAlternativeKeys(loser, batch, options.maxAlternatives, options.detector)
            const reason =
                conflict.type === 'system'
                    ? `${conflict.key} is reserved by the system`
                    : `Lost ${conflict.key} to ${loser.conflicts.join(', ')}`
            suggestions.set(loser.id, {
                id: `conflict-resolution:${loser.id}`,
                kind: 'conflict-resolution',
                tool: loser.tool,
                keybindIds: [loser.id],
                action: loser.action,
                currentKey: loser.canonical,
                suggestedKey: alternatives[0],
                alternatives,
                reason,
                confidence: scoreConfidence('conflict-resolution', {
                    userSource: loser.source === 'user',
                    highFrequency: loser.frequency === 'high',
                    fromError: conflict.severity === 'error',
                }),
            })
        }
    }

    return [...suggestions.values()]
}

/**
 * Keybinds holding more modifiers than the configured maximum.
 */
export function suggestSimplerKeys(
    batch: readonly Keybind[],
    options: SuggestionOptions = defaultSuggestionOptions,
): KeybindSuggestion[] {
    const suggestions: KeybindSuggestion[] = []

    for (const keybind of batch) {
        if (keybind.disabled || keybind.modifiers.length <= options.maxModifiers) continue

        const alternatives = findAlternativeKeys(keybind, batch, Number.POSITIVE_INFINITY, options.detector)
            .filter((candidate) => normalize(candidate).modifiers.length <= options.maxModifiers)
            .slice(0, options.maxAlternatives)
        suggestions.push({
            id: `complexity:${keybind.id}`,
            kind: 'complexity',
            tool: keybind.tool,
            keybindIds: [keybind.id],
            action: keybind.action,
            currentKey: keybind.canonical,
            suggestedKey: alternatives[0],
            alternatives,
            reason: `Uses ${String(keybind.modifiers.length)} modifiers, more than ${String(options.maxModifiers)}`,
            confidence: scoreConfidence('complexity', {
                userSource: keybind.source === 'user',
                highFrequency: keybind.frequency === 'high',
            }),
        })
    }

    return suggestions
}

/**
 * Tools whose modified keybinds don't share a dominant modifier pattern.
 * The pattern of a keybind is its canonical modifier list, for example 'ctrl+shift'.
 */
export function suggestModifierPatterns(
    batch: readonly Keybind[],
    options: SuggestionOptions = defaultSuggestionOptions,
): KeybindSuggestion[] {
    const byTool = new Map<string, Keybind[]>()
    for (const keybind of batch) {
        if (keybind.disabled || keybind.modifiers.length === 0) continue
        const records = byTool.get(keybind.tool) ?? []
        records.push(keybind)
        byTool.set(keybind.tool, records)
    }

    const suggestions: KeybindSuggestion[] = []
    for (const [tool, records] of byTool) {
        if (records.length < MIN_PATTERN_SAMPLE) continue

        const counts = new Map<string, number>()
        for (const keybind of records) {
            const pattern = keybind.modifiers.join('+')
            counts.set(pattern, (counts.get(pattern) ?? 0) + 1)
        }

        const [dominant, dominantCount] = [...counts.entries()].sort((a, b) =>
            a[1] !== b[1] ? b[1] - a[1] : a[0] < b[0] ? -1 : 1,
        )[0]
        const share = dominantCount / records.length
        if (share >= options.patternConsistencyThreshold) continue

        suggestions.push({
            id: `modifier-pattern:${tool}`,
            kind: 'modifier-pattern',
            tool,
            keybindIds: records.filter((keybind) => keybind.modifiers.join('+') !== dominant).map((kb) => kb.id),
            action: `Standardize ${tool} modifiers on ${dominant}`,
            alternatives: [],
            reason: `Only ${String(Math.round(share * 100))}% of ${tool} keybinds use ${dominant}`,
            confidence: scoreConfidence('modifier-pattern'),
        })
    }

    return suggestions
}

/**
 * Frequently used actions bound to keys that are awkward to press.
 */
export function suggestErgonomicKeys(
    batch: readonly Keybind[],
    options: SuggestionOptions = defaultSuggestionOptions,
): KeybindSuggestion[] {
    const suggestions: KeybindSuggestion[] = []

    for (const keybind of batch) {
        if (keybind.disabled || keybind.frequency !== 'high' || !isAwkward(keybind.baseKey, keybind.modifiers.length)) {
            continue
        }

        const alternatives = findAlternativeKeys(keybind, batch, Number.POSITIVE_INFINITY, options.detector)
            .filter((candidate) => {
                const { key, modifiers } = normalize(candidate)
                return !isAwkward(key, modifiers.length)
            })
            .sort((a, b) => Number(easyKeys.has(normalize(b).key)) - Number(easyKeys.has(normalize(a).key)))
            .slice(0, options.maxAlternatives)
        suggestions.push({
            id: `ergonomics:${keybind.id}`,
            kind: 'ergonomics',
            tool: keybind.tool,
            keybindIds: [keybind.id],
            action: keybind.action,
            currentKey: keybind.canonical,
            suggestedKey: alternatives[0],
            alternatives,
            reason: awkwardKeys.has(keybind.baseKey)
                ? `Frequently used action on ${keybind.baseKey}, which is far from the home row`
                : `Frequently used action on hard-to-reach ${keybind.baseKey} with several modifiers`,
            confidence: scoreConfidence('ergonomics', {
                userSource: keybind.source === 'user',
                highFrequency: true,
            }),
        })
    }

    return suggestions
}

function isAwkward(baseKey: string, modifierCount: number): boolean {
    return awkwardKeys.has(baseKey) || (modifierCount > 1 && hardToReachKeys.has(baseKey))
}

/**
 * Configuration-wide advice drawn from conflict counts.
 */
export function suggestOrganization(conflicts: readonly Conflict[]): KeybindSuggestion[] {
    const suggestions: KeybindSuggestion[] = []
    const hard = conflicts.filter((conflict) => conflict.type === 'hard')
    const crossTool = conflicts.filter((conflict) => conflict.type === 'cross-tool')

    if (hard.length > HARD_COLLISION_LIMIT) {
        suggestions.push({
            id: 'organization:hard-collisions',
            kind: 'organization',
            keybindIds: [...new Set(hard.flatMap((conflict) => conflict.keybinds))],
            action: 'Review keybinding organization',
            alternatives: [],
            reason: `${String(hard.length)} hard collisions found`,
            confidence: scoreConfidence('organization', { fromError: true }),
        })
    }

    if (crossTool.length > CROSS_TOOL_LIMIT) {
        suggestions.push({
            id: 'organization:cross-tool',
            kind: 'organization',
            keybindIds: [...new Set(crossTool.flatMap((conflict) => conflict.keybinds))],
            action: 'Standardize modifier usage across tools',
            alternatives: [],
            reason: `${String(crossTool.length)} keys are shared between tools in overlapping contexts`,
            confidence: scoreConfidence('organization'),
        })
    }

    return suggestions
}

/**
 * Every per-keybind and per-tool suggestion for a resolved batch, ranked.
 */
export function generateSuggestions(
    batch: readonly Keybind[],
    resolved: readonly Conflict[],
    options: Partial<SuggestionOptions> = {},
): KeybindSuggestion[] {
    const opts = { ...defaultSuggestionOptions, ...options }
    const suggestions = rankSuggestions([
        ...suggestConflictResolutions(resolved, batch, opts),
        ...suggestSimplerKeys(batch, opts),
        ...suggestModifierPatterns(batch, opts),
        ...suggestErgonomicKeys(batch, opts),
    ])

    log.debug('Generated {count} suggestions for {keybinds} keybinds', {
        count: suggestions.length,
        keybinds: batch.length,
    })
    return suggestions
}

/**
 * Priority-based merge of per-tool keybind layers into one configuration.
 *
 * Flow: prepare copies of the input records, layer each tool (system → default → user → generated),
 * detect conflicts once across all tools, hand shadowed slots to the user record, resolve every error
 * conflict, then group, partition and count.
 * Resolution changes records' enabled state. It never changes a conflict.
 */

import { getAppLogger } from '$lib/logger'
import { isGlobalScope } from './context-scope'
import { detectAllCollisions, type DetectorOptions } from './collision-detector'
import { InvalidKeybindError } from './errors'
import { normalize } from './key-normalizer'
import { generateSuggestions, suggestOrganization } from './suggestion-engine'
import {
    keybindSources,
    PriorityTier,
    type Conflict,
    type Frequency,
    type Keybind,
    type KeybindInput,
    type KeybindSource,
    type KeybindSuggestion,
    type MergedConfiguration,
    type MergeOptions,
    type MergeStatistics,
    type ToolLayers,
    type ToolResult,
} from './types'
import { buildValidationResult } from './validation'

const log = getAppLogger('merger')

/** Shape version of MergedConfiguration */
export const MERGED_CONFIGURATION_VERSION = '1.0.0'

export const defaultMergeOptions: MergeOptions = {
    resolveConflicts: true,
    prioritizeUserConfig: true,
    allowSystemOverrides: false,
    preserveDisabled: true,
    generateSuggestions: true,
    reservedKeyPolicy: 'absolute',
    maxAlternatives: 5,
    maxModifiers: 3,
    patternConsistencyThreshold: 0.6,
}

const sourcePriority: Record<KeybindSource, PriorityTier> = {
    system: PriorityTier.SystemReserved,
    default: PriorityTier.ToolDefault,
    user: PriorityTier.UserOverride,
    generated: PriorityTier.Generated,
}

const frequencyRank: Record<Frequency, number> = { high: 0, medium: 1, low: 2 }

/** Layer fields in the order they're applied */
const layerOrder = ['system', 'defaults', 'user', 'generated'] as const satisfies ReadonlyArray<keyof ToolLayers>

// ============================================================================
// Record preparation
// ============================================================================

function isKnownSource(source: string): source is KeybindSource {
    return keybindSources.some((known) => known === source)
}

function isBlank(value: unknown): boolean {
    return typeof value !== 'string' || value.trim() === ''
}

/**
 * Build an engine record from an extractor record. The input is never mutated.
 * @throws InvalidKeybindError when id, tool or key is missing or blank, or the source is unknown
 */
export function prepareKeybind(input: KeybindInput): Keybind {
    const id = typeof input.id === 'string' ? input.id : ''
    if (isBlank(input.id)) throw new InvalidKeybindError(id, 'missing id')
    if (isBlank(input.tool)) throw new InvalidKeybindError(id, 'missing tool')
    if (isBlank(input.key)) throw new InvalidKeybindError(id, 'missing key')
    if (!isKnownSource(input.source)) {
        throw new InvalidKeybindError(id, `unknown source '${String(input.source)}'`)
    }

    const normalized = normalize(input.key)
    const keybind: Keybind = {
        id: input.id,
        tool: input.tool,
        key: input.key,
        action: input.action ?? input.id,
        context: input.context,
        source: input.source,
        priority: sourcePriority[input.source],
        canonical: normalized.canonical,
        baseKey: normalized.key,
        modifiers: [...normalized.modifiers],
        disabled: input.disabled === true,
        conflicts: [...(input.conflicts ?? [])],
    }

    if (normalized.sequence) keybind.sequence = [...normalized.sequence]
    if (input.category !== undefined) keybind.category = input.category
    if (input.tags !== undefined) keybind.tags = [...input.tags]
    if (input.frequency !== undefined) keybind.frequency = input.frequency
    if (input.difficulty !== undefined) keybind.difficulty = input.difficulty
    if (input.sourceFile !== undefined) keybind.sourceFile = input.sourceFile
    if (input.sourceLine !== undefined) keybind.sourceLine = input.sourceLine

    return keybind
}

function markDisabled(keybind: Keybind, reason: string, heldBy?: string): void {
    keybind.disabled = true
    keybind.disabledReason = reason
    if (heldBy !== undefined && !keybind.conflicts.includes(heldBy)) {
        keybind.conflicts.push(heldBy)
    }
}

function addConflictRef(keybind: Keybind, id: string): void {
    if (!keybind.conflicts.includes(id)) keybind.conflicts.push(id)
}

// ============================================================================
// Intra-tool layering
// ============================================================================

/**
 * Layer one tool's record sets. Every input record comes back; a record that loses its
 * (context, canonical key) slot during layering is disabled and points at the record holding it.
 */
export function mergeToolLayers(layers: ToolLayers, options: Partial<MergeOptions> = {}): Keybind[] {
    const opts = { ...defaultMergeOptions, ...options }
    const records: Keybind[] = []
    const slots = new Map<string, Keybind>()

    for (const layer of layerOrder) {
        for (const input of layers[layer] ?? []) {
            const keybind = prepareKeybind(input)
            records.push(keybind)
            if (keybind.disabled) continue

            const slot = `${keybind.context}\u0000${keybind.canonical}`
            const holder = slots.get(slot)
            if (!holder) {
                slots.set(slot, keybind)
            } else if (keybind.source === 'generated') {
                // Generated records only fill empty slots
                markDisabled(keybind, `Slot already held by ${holder.id}`, holder.id)
            } else if (shouldReplace(holder, keybind, opts)) {
                markDisabled(holder, `Replaced by ${keybind.source} keybinding ${keybind.id}`, keybind.id)
                slots.set(slot, keybind)
            }
            // Otherwise both stay enabled and the detector reports them
        }
    }

    return records
}

function shouldReplace(holder: Keybind, incoming: Keybind, opts: MergeOptions): boolean {
    if (holder.source === 'system' && !opts.allowSystemOverrides) return false
    if (incoming.source === 'user') return opts.prioritizeUserConfig && holder.source !== 'user'
    return incoming.priority > holder.priority
}

/**
 * Split a flat record list into per-tool layers by source, keeping input order.
 */
export function groupIntoLayers(batch: readonly KeybindInput[]): Record<string, ToolLayers> {
    const grouped: Record<string, ToolLayers> = {}

    for (const input of batch) {
        const layers = (grouped[input.tool] ??= {})
        const field = input.source === 'default' ? 'defaults' : input.source
        const list = (layers[field] ??= [])
        list.push(input)
    }

    return grouped
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Ordering for hard collisions: user records first, then lower priority tier,
 * then higher frequency, then id.
 */
export function compareForResolution(a: Keybind, b: Keybind): number {
    const userA = a.source === 'user' ? 0 : 1
    const userB = b.source === 'user' ? 0 : 1
    if (userA !== userB) return userA - userB

    if (a.priority !== b.priority) return a.priority - b.priority

    const freqA = a.frequency ? frequencyRank[a.frequency] : 3
    const freqB = b.frequency ? frequencyRank[b.frequency] : 3
    if (freqA !== freqB) return freqA - freqB

    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * Apply conflicts to the batch's records and return the ones that are settled.
 * System-reserved overrides are always enforced. A shadowed default gives up its slot
 * to the user record, also across tools; the shadow itself stays an open info conflict.
 * Hard collisions are settled when resolveConflicts is on, or when at most one participant is still enabled.
 */
function resolveConflicts(batch: Keybind[], conflicts: readonly Conflict[], opts: MergeOptions): Conflict[] {
    const byId = new Map(batch.map((keybind) => [keybind.id, keybind]))
    const resolved: Conflict[] = []

    for (const conflict of conflicts) {
        if (conflict.type !== 'system') continue
        for (const id of conflict.keybinds) {
            const keybind = byId.get(id)
            if (keybind && keybind.source !== 'system' && !keybind.disabled) {
                markDisabled(keybind, `${conflict.key} is reserved by the system`)
            }
        }
        resolved.push(conflict)
    }

    for (const conflict of conflicts) {
        if (conflict.type !== 'shadow') continue
        const participants = conflict.keybinds
            .map((id) => byId.get(id))
            .filter((keybind): keybind is Keybind => keybind !== undefined)
        const user = participants.find((keybind) => keybind.source === 'user' && !keybind.disabled)
        if (!user) continue
        for (const shadowed of participants) {
            if (shadowed.source === 'default' && !shadowed.disabled) {
                markDisabled(shadowed, `Shadowed by user keybinding ${user.id}`, user.id)
                addConflictRef(user, shadowed.id)
            }
        }
    }

    for (const conflict of conflicts) {
        if (conflict.type !== 'hard') continue

        const active = conflict.keybinds
            .map((id) => byId.get(id))
            .filter((keybind): keybind is Keybind => keybind !== undefined && !keybind.disabled)

        if (active.length < 2) {
            resolved.push(conflict)
            continue
        }
        if (!opts.resolveConflicts) continue

        const [winner, ...losers] = [...active].sort(compareForResolution)
        for (const loser of losers) {
            markDisabled(loser, `Lost ${conflict.key} in ${loser.context} to ${winner.id}`, winner.id)
            addConflictRef(winner, loser.id)
        }
        log.debug('Resolved {key}: {winner} wins over {count} keybinds', {
            key: conflict.key,
            winner: winner.id,
            count: losers.length,
        })
        resolved.push(conflict)
    }

    return resolved
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Merge every tool's layers into one configuration.
 * @throws InvalidKeybindError for structurally invalid records
 */
export function merge(toolLayers: Record<string, ToolLayers>, options: Partial<MergeOptions> = {}): MergedConfiguration {
    const opts = { ...defaultMergeOptions, ...options }
    const detectorOptions: DetectorOptions = {
        reservedKeyPolicy: opts.reservedKeyPolicy,
        allowSystemOverrides: opts.allowSystemOverrides,
        maxAlternatives: opts.maxAlternatives,
    }

    const layered = Object.entries(toolLayers).map(([tool, layers]) => ({
        tool,
        records: mergeToolLayers(layers, opts),
    }))
    const batch = layered.flatMap(({ records }) => records)
    log.debug('Layered {count} keybinds from {tools} tools', { count: batch.length, tools: layered.length })

    const conflicts = detectAllCollisions(batch, detectorOptions)
    const resolved = resolveConflicts(batch, conflicts, opts)
    const resolvedIds = new Set(resolved.map((conflict) => conflict.id))

    const suggestions = opts.generateSuggestions
        ? generateSuggestions(batch, resolved, {
              maxAlternatives: opts.maxAlternatives,
              maxModifiers: opts.maxModifiers,
              patternConsistencyThreshold: opts.patternConsistencyThreshold,
              detector: detectorOptions,
          })
        : []

    const tools: Record<string, ToolResult> = {}
    for (const { tool, records } of layered) {
        tools[tool] = buildToolResult(tool, records, conflicts, suggestions, opts.preserveDisabled)
    }

    const unresolved = conflicts.filter((conflict) => !resolvedIds.has(conflict.id))
    const result: MergedConfiguration = {
        version: MERGED_CONFIGURATION_VERSION,
        tools,
        collisions: {
            global: unresolved.filter((conflict) => isGlobalScope(conflict.contexts, conflict.tools)),
            contextual: unresolved.filter((conflict) => !isGlobalScope(conflict.contexts, conflict.tools)),
            resolved,
        },
        validation: buildValidationResult(conflicts, {
            resolvedIds,
            suggestions: suggestOrganization(conflicts),
        }),
        statistics: computeStatistics(batch, conflicts),
    }

    log.info('Merged {count} keybinds: {enabled} enabled, {conflicts} conflicts, {resolved} resolved', {
        count: batch.length,
        enabled: result.statistics.enabled,
        conflicts: conflicts.length,
        resolved: resolved.length,
    })
    return result
}

function buildToolResult(
    tool: string,
    records: Keybind[],
    conflicts: readonly Conflict[],
    suggestions: readonly KeybindSuggestion[],
    preserveDisabled: boolean,
): ToolResult {
    const visible = preserveDisabled ? records : records.filter((keybind) => !keybind.disabled)
    const ids = new Set(records.map((keybind) => keybind.id))

    return {
        tool,
        system: visible.filter((keybind) => keybind.source === 'system'),
        defaults: visible.filter((keybind) => keybind.source === 'default'),
        user: visible.filter((keybind) => keybind.source === 'user'),
        generated: visible.filter((keybind) => keybind.source === 'generated'),
        conflicts: conflicts.filter((conflict) => conflict.keybinds.some((id) => ids.has(id))),
        suggestions: suggestions.filter((suggestion) => suggestion.tool === tool),
    }
}

function computeStatistics(batch: readonly Keybind[], conflicts: readonly Conflict[]): MergeStatistics {
    const enabled = batch.filter((keybind) => !keybind.disabled).length
    const byTool: Record<string, number> = {}
    const bySource: MergeStatistics['bySource'] = { system: 0, default: 0, user: 0, generated: 0 }
    const conflictCounts: MergeStatistics['conflicts'] = { hard: 0, soft: 0, shadow: 0, 'cross-tool': 0, system: 0 }

    for (const keybind of batch) {
        byTool[keybind.tool] = (byTool[keybind.tool] ?? 0) + 1
        bySource[keybind.source] += 1
    }
    for (const conflict of conflicts) {
        conflictCounts[conflict.type] += 1
    }

    return {
        totalKeybinds: batch.length,
        enabled,
        disabled: batch.length - enabled,
        byTool,
        bySource,
        conflicts: conflictCounts,
    }
}

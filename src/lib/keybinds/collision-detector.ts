/**
 * Conflict detection for keybinds.
 *
 * Every call builds a fresh registry from the batch it's given; nothing is shared between calls.
 * Records are grouped by canonical key, then by context:
 * - same context, one default + one user: shadow (info, an intended override)
 * - same context, two or more enabled records otherwise: hard collision (error)
 * - all contexts distinct but overlapping: cross-tool or soft collision (warning)
 * - any enabled non-system record on a system-reserved key: system override (error)
 */

import { getAppLogger } from '$lib/logger'
import { contextsOverlap, hasOverlappingContexts } from './context-scope'
import { generateKeyAlternatives } from './key-alternatives'
import { formatKey, isSystemReserved, normalize } from './key-normalizer'
import type {
    CollisionRegistry,
    Conflict,
    ConflictSeverity,
    ConflictType,
    Keybind,
    ReservedKeyPolicy,
} from './types'

const log = getAppLogger('detector')

export interface DetectorOptions {
    reservedKeyPolicy: ReservedKeyPolicy
    allowSystemOverrides: boolean
    /** How many free keys to attach to an error conflict */
    maxAlternatives: number
}

export const defaultDetectorOptions: DetectorOptions = {
    reservedKeyPolicy: 'absolute',
    allowSystemOverrides: false,
    maxAlternatives: 5,
}

export interface RegistryScope {
    context?: string
    tool?: string
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Index a batch by canonical key: globally, per context, and per tool.
 */
export function buildRegistry(batch: readonly Keybind[]): CollisionRegistry {
    const registry: CollisionRegistry = {
        globalKeys: new Map(),
        contextKeys: new Map(),
        toolKeys: new Map(),
    }

    for (const keybind of batch) {
        addTo(registry.globalKeys, keybind.canonical, keybind.id)
        addTo(nestedBucket(registry.contextKeys, keybind.context), keybind.canonical, keybind.id)
        addTo(nestedBucket(registry.toolKeys, keybind.tool), keybind.canonical, keybind.id)
    }

    return registry
}

function addTo(index: Map<string, string[]>, key: string, id: string): void {
    const ids = index.get(key)
    if (ids) {
        ids.push(id)
    } else {
        index.set(key, [id])
    }
}

function nestedBucket(index: Map<string, Map<string, string[]>>, scope: string): Map<string, string[]> {
    let bucket = index.get(scope)
    if (!bucket) {
        bucket = new Map()
        index.set(scope, bucket)
    }
    return bucket
}

/**
 * Ids of records bound to a canonical key, optionally narrowed to one context or tool.
 */
export function lookupKeybinds(registry: CollisionRegistry, canonical: string, scope: RegistryScope = {}): string[] {
    if (scope.context !== undefined) {
        const ids = registry.contextKeys.get(scope.context)?.get(canonical) ?? []
        if (scope.tool === undefined) return [...ids]
        const toolIds = new Set(registry.toolKeys.get(scope.tool)?.get(canonical) ?? [])
        return ids.filter((id) => toolIds.has(id))
    }
    if (scope.tool !== undefined) {
        return [...(registry.toolKeys.get(scope.tool)?.get(canonical) ?? [])]
    }
    return [...(registry.globalKeys.get(canonical) ?? [])]
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Find every conflict in a batch, classified and deduplicated.
 */
export function detectAllCollisions(batch: readonly Keybind[], options: Partial<DetectorOptions> = {}): Conflict[] {
    const opts = { ...defaultDetectorOptions, ...options }
    const registry = buildRegistry(batch)
    const byId = new Map(batch.map((keybind) => [keybind.id, keybind]))
    const conflicts: Conflict[] = []

    for (const [canonical, ids] of registry.globalKeys) {
        if (ids.length < 2) continue
        const participants = ids.map((id) => byId.get(id)).filter((kb): kb is Keybind => kb !== undefined)
        conflicts.push(...classifyBucket(canonical, participants, registry, opts))
    }

    for (const keybind of batch) {
        const reserved = checkSystemReserved(keybind, registry, opts)
        if (reserved) conflicts.push(reserved)
    }

    const unique = deduplicateConflicts(conflicts)
    log.debug('Detected {count} conflicts across {keys} canonical keys', {
        count: unique.length,
        keys: registry.globalKeys.size,
    })
    return unique
}

/**
 * Check one proposed record against a batch, applying the same rules as detectAllCollisions
 * but only reporting conflicts the candidate takes part in.
 */
export function detectKeybindCollisions(
    candidate: Keybind,
    batch: readonly Keybind[],
    options: Partial<DetectorOptions> = {},
): Conflict[] {
    const opts = { ...defaultDetectorOptions, ...options }
    const others = batch.filter((keybind) => keybind.id !== candidate.id)
    const registry = buildRegistry(others)
    const peerIds = new Set(lookupKeybinds(registry, candidate.canonical))
    const conflicts: Conflict[] = []

    if (peerIds.size > 0) {
        const peers = others.filter((keybind) => peerIds.has(keybind.id))
        const bucketConflicts = classifyBucket(candidate.canonical, [candidate, ...peers], registry, opts)
        conflicts.push(...bucketConflicts.filter((conflict) => conflict.keybinds.includes(candidate.id)))
    }

    const reserved = checkSystemReserved(candidate, registry, opts)
    if (reserved) conflicts.push(reserved)

    return deduplicateConflicts(conflicts)
}

/**
 * Classify the records sharing one canonical key.
 */
function classifyBucket(
    canonical: string,
    participants: Keybind[],
    registry: CollisionRegistry,
    opts: DetectorOptions,
): Conflict[] {
    const groups = new Map<string, Keybind[]>()
    for (const keybind of participants) {
        const group = groups.get(keybind.context)
        if (group) {
            group.push(keybind)
        } else {
            groups.set(keybind.context, [keybind])
        }
    }

    // Every record in its own context: only a problem if the contexts overlap
    if (groups.size === participants.length) {
        const active = participants.filter((keybind) => !keybind.disabled)
        if (active.length < 2 || !hasOverlappingContexts(active)) return []

        const overlapping = active.filter((keybind) =>
            active.some((other) => other !== keybind && contextsOverlap(keybind, other)),
        )
        const tools = uniqueValues(overlapping.map((keybind) => keybind.tool))
        const type: ConflictType = tools.length > 1 ? 'cross-tool' : 'soft'
        const display = formatKey(normalize(canonical))
        const message =
            type === 'cross-tool'
                ? `Key ${display} is used by ${tools.join(', ')} in overlapping contexts`
                : `Key ${display} is used in overlapping ${tools.join(', ')} contexts: ${uniqueValues(overlapping.map((kb) => kb.context)).join(', ')}`
        return [makeConflict(type, 'warning', canonical, overlapping, message, [])]
    }

    const conflicts: Conflict[] = []
    for (const [context, members] of groups) {
        if (members.length < 2) continue

        if (isShadowPair(members)) {
            conflicts.push(
                makeConflict(
                    'shadow',
                    'info',
                    canonical,
                    members,
                    `User keybinding for ${formatKey(normalize(canonical))} overrides the default in context "${context}"`,
                    [],
                ),
            )
            continue
        }

        const active = members.filter((keybind) => !keybind.disabled)
        if (active.length < 2) continue

        const actions = active.map((keybind) => `"${keybind.action}"`).join(', ')
        conflicts.push(
            makeConflict(
                'hard',
                'error',
                canonical,
                active,
                `Key ${formatKey(normalize(canonical))} is bound to ${String(active.length)} actions in context "${context}": ${actions}`,
                findFreeKeys(canonical, registry, opts.maxAlternatives),
            ),
        )
    }
    return conflicts
}

/** Exactly one default and one user record: the user intentionally rebinds the default */
function isShadowPair(members: Keybind[]): boolean {
    if (members.length !== 2) return false
    const sources = members.map((keybind) => keybind.source)
    return sources.includes('default') && sources.includes('user')
}

function checkSystemReserved(
    keybind: Keybind,
    registry: CollisionRegistry,
    opts: DetectorOptions,
): Conflict | null {
    if (keybind.source === 'system' || keybind.disabled || !isSystemReserved(keybind.canonical)) {
        return null
    }

    const deferred = opts.reservedKeyPolicy === 'defer-to-overrides' && opts.allowSystemOverrides
    return makeConflict(
        'system',
        deferred ? 'warning' : 'error',
        keybind.canonical,
        [keybind],
        `${formatKey(normalize(keybind.canonical))} is reserved by the system and can't be bound by ${keybind.tool}`,
        findFreeKeys(keybind.canonical, registry, opts.maxAlternatives),
    )
}

/**
 * Alternatives that nothing in the registry uses and that aren't reserved.
 */
function findFreeKeys(canonical: string, registry: CollisionRegistry, limit: number): string[] {
    return generateKeyAlternatives(normalize(canonical))
        .filter((candidate) => !registry.globalKeys.has(candidate) && !isSystemReserved(candidate))
        .slice(0, limit)
}

function makeConflict(
    type: ConflictType,
    severity: ConflictSeverity,
    canonical: string,
    participants: Keybind[],
    message: string,
    suggestions: string[],
): Conflict {
    const keybinds = participants.map((keybind) => keybind.id)
    return {
        id: conflictSignature(type, canonical, keybinds),
        severity,
        type,
        key: canonical,
        keybinds,
        contexts: uniqueValues(participants.map((keybind) => keybind.context)),
        tools: uniqueValues(participants.map((keybind) => keybind.tool)),
        message,
        suggestions,
    }
}

/**
 * Signature used for deduplication: type, canonical key, and sorted participant ids.
 */
export function conflictSignature(type: ConflictType, canonical: string, keybindIds: readonly string[]): string {
    return `${type}|${canonical}|${[...keybindIds].sort().join(',')}`
}

function deduplicateConflicts(conflicts: Conflict[]): Conflict[] {
    const seen = new Set<string>()
    const unique: Conflict[] = []

    for (const conflict of conflicts) {
        if (seen.has(conflict.id)) continue
        seen.add(conflict.id)
        unique.push(conflict)
    }

    return unique
}

function uniqueValues(values: string[]): string[] {
    return [...new Set(values)]
}

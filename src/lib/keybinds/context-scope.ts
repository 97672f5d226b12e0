/**
 * Context overlap for keybind conflict detection.
 * A context is the scope within which a canonical key must be unique.
 */

/** The context that is active everywhere */
export const GLOBAL_CONTEXT = 'global'

/** Anything that lives in a context and belongs to a tool */
export interface ContextScoped {
    context: string
    tool: string
}

/**
 * Check if two scoped records can be active at the same time.
 * The global context overlaps with everything, and every context of one tool overlaps
 * with the tool's other contexts. Different tools' own contexts never overlap.
 */
export function contextsOverlap(a: ContextScoped, b: ContextScoped): boolean {
    if (a.context === b.context) return true
    if (a.context === GLOBAL_CONTEXT || b.context === GLOBAL_CONTEXT) return true
    return a.tool === b.tool
}

/**
 * Check if any two of the given records sit in overlapping contexts.
 */
export function hasOverlappingContexts(scoped: readonly ContextScoped[]): boolean {
    for (let i = 0; i < scoped.length; i++) {
        for (let j = i + 1; j < scoped.length; j++) {
            if (contextsOverlap(scoped[i], scoped[j])) return true
        }
    }
    return false
}

/** True when the records span the global context or more than one tool */
export function isGlobalScope(contexts: readonly string[], tools: readonly string[]): boolean {
    return contexts.includes(GLOBAL_CONTEXT) || new Set(tools).size > 1
}

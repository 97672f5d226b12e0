/**
 * Candidate replacement keys for a shortcut: nearby modifier combinations first,
 * then physically adjacent base keys with the same modifiers.
 */

import keyTables from './key-tables.json'
import { composeCanonical, normalize, SEQUENCE_SEPARATOR } from './key-normalizer'
import type { Modifier, NormalizedKey } from './types'

const adjacentKeys = new Map<string, string[]>(Object.entries(keyTables.adjacentKeys))

/** QWERTY neighbours of a base key (canonical form), or an empty list */
export function getAdjacentKeys(key: string): string[] {
    return adjacentKeys.get(key) ?? []
}

/**
 * Candidate canonical keys, in probing order, never including the key itself.
 * For a sequence only the final step varies.
 */
export function generateKeyAlternatives(normalized: NormalizedKey): string[] {
    if (normalized.sequence && normalized.sequence.length > 0) {
        const prefix = normalized.sequence.slice(0, -1)
        const last = normalize(normalized.sequence[normalized.sequence.length - 1])
        return generateComboAlternatives(last).map((step) => [...prefix, step].join(SEQUENCE_SEPARATOR))
    }
    return generateComboAlternatives(normalized)
}

function generateComboAlternatives({ key, modifiers }: NormalizedKey): string[] {
    if (!key) return []

    const variations: Modifier[][] = [
        [...modifiers, 'shift'],
        [...modifiers, 'option'],
        [...modifiers, 'ctrl'],
        modifiers.filter((m) => m !== 'shift'),
        modifiers.filter((m) => m !== 'option'),
        [...modifiers.filter((m) => m !== 'shift'), 'option'],
    ]

    const candidates = variations.map((mods) => composeCanonical(mods, key))
    for (const adjacent of getAdjacentKeys(key)) {
        candidates.push(composeCanonical(modifiers, adjacent))
    }

    const original = composeCanonical(modifiers, key)
    return [...new Set(candidates)].filter((candidate) => candidate !== original)
}

/**
 * Key normalization.
 * Turns any supported key notation into one canonical string so that equal shortcuts compare equal:
 *   'cmd+shift+a', 'Command+Shift+A', '⌘⇧A'  ->  'shift+meta+A'
 *   'C-M-a'                                  ->  'ctrl+option+A'
 *   'C-b c'                                  ->  'ctrl+B → C'
 * Unknown tokens pass through capitalized, so normalize never throws.
 */

import keyTables from './key-tables.json'
import { modifierOrder, type Modifier, type NormalizedKey } from './types'

/** Joins the steps of a sequence. Combo strings never contain whitespace, so this can't collide. */
export const SEQUENCE_SEPARATOR = ' → '

export type KeyFormatStyle = 'symbols' | 'text'

function isModifier(name: string): name is Modifier {
    return modifierOrder.some((modifier) => modifier === name)
}

function toModifierMap(table: Record<string, string>): Map<string, Modifier> {
    const map = new Map<string, Modifier>()
    for (const [alias, name] of Object.entries(table)) {
        if (isModifier(name)) {
            map.set(alias, name)
        }
    }
    return map
}

const modifierAliases = toModifierMap(keyTables.modifierAliases)
// tmux's C-, M-, S- prefixes; only meaningful in hyphen notation
const hyphenModifierAliases = toModifierMap(keyTables.hyphenModifierAliases)
const specialKeys = new Map<string, string>(Object.entries(keyTables.specialKeys))
// Key names that carry a modifier of their own: tmux's BTab is Shift+Tab
const impliedModifiers = new Map<string, Modifier[]>(
    Object.entries(keyTables.impliedModifiers).map(([name, modifiers]) => [name, modifiers.filter(isModifier)]),
)
const modifierLabels: Record<Modifier, { symbol: string; text: string }> = keyTables.modifierLabels

let reservedCanonicalKeys: Set<string> | null = null

/**
 * Normalize a key specification.
 * Sequences are detected first, then each step is normalized as a single combo.
 */
export function normalize(raw: string): NormalizedKey {
    const text = raw.trim()
    const steps = isSpacedSpecialKey(text) ? [text] : splitSequence(text)

    if (steps.length > 1) {
        const sequence = steps.map((step) => normalizeCombo(step).canonical)
        return {
            key: '',
            modifiers: [],
            sequence,
            canonical: sequence.join(SEQUENCE_SEPARATOR),
        }
    }

    return normalizeCombo(text)
}

/** Multi-word names of one special key, such as 'page up'. Single-letter steps ('b s') stay a sequence. */
function isSpacedSpecialKey(text: string): boolean {
    const words = text.toLowerCase().split(/\s+/)
    return words.length > 1 && words.every((word) => word.length > 1) && specialKeys.has(words.join(''))
}

/**
 * Split text into sequence steps. Returns a single element for a plain combo.
 */
function splitSequence(text: string): string[] {
    // Explicit separators. A comma only separates when both sides are non-empty ('ctrl+,' is a combo).
    for (const separator of [/\s+then\s+/i, /\s+→\s+/, /\s*,\s*/]) {
        const parts = text.split(separator)
        if (parts.length > 1 && parts.every((part) => part.length > 0)) {
            return parts
        }
    }

    // Whitespace that isn't padding around '+', '-' or a modifier glyph separates steps: 'C-b c', 'ctrl+b c', 'g g'
    const compact = text.replace(/\s*([+-])\s*/g, '$1').replace(/([⌘⌃⌥⇧])\s+/g, '$1')
    if (/\s/.test(compact)) {
        return compact.split(/\s+/)
    }

    return [text]
}

function normalizeCombo(text: string): NormalizedKey {
    const lowered = text.toLowerCase()

    const wholeName = lowered.replace(/\s+/g, '')
    const whole = specialKeys.get(wholeName)
    if (whole) {
        return buildKey(new Set(impliedModifiers.get(wholeName)), whole)
    }

    const modifiers = new Set<Modifier>()

    // Symbolic modifiers can appear anywhere: '⌘⇧A', '⇧⌘A', '⌘+A'
    let rest = lowered
    for (const glyph of keyTables.modifierGlyphs) {
        if (!rest.includes(glyph)) continue
        const modifier = modifierAliases.get(glyph)
        if (modifier) modifiers.add(modifier)
        rest = rest.split(glyph).join('')
    }
    rest = rest.trim()
    if (modifiers.size > 0 && rest.length > 1) {
        rest = rest.replace(/^[+-]\s*/, '')
    }

    const { tokens, style } = splitTokens(rest)
    const keys: string[] = []

    tokens.forEach((token, index) => {
        const isLast = index === tokens.length - 1
        if (!isLast) {
            const modifier =
                modifierAliases.get(token) ?? (style === 'hyphen' ? hyphenModifierAliases.get(token) : undefined)
            if (modifier) {
                modifiers.add(modifier)
                return
            }
        }
        for (const implied of impliedModifiers.get(token) ?? []) {
            modifiers.add(implied)
        }
        keys.push(normalizeBaseKey(token))
    })

    // Unrecognized leading tokens stay part of the key ('ctrl+x+y' -> 'ctrl+X+Y')
    return buildKey(modifiers, keys.join('+'))
}

/**
 * Split a combo by the separator style present. '+' wins over '-'.
 * A doubled trailing separator is the key itself: 'ctrl++', 'C--'.
 */
function splitTokens(text: string): { tokens: string[]; style: 'plus' | 'hyphen' | 'single' } {
    if (text.length <= 1) {
        return { tokens: text ? [text] : [], style: 'single' }
    }

    const separator = text.includes('+') ? '+' : text.includes('-') ? '-' : null
    if (!separator) {
        return { tokens: [text.replace(/\s+/g, '')], style: 'single' }
    }

    const parts = text.split(separator).map((part) => part.replace(/\s+/g, ''))
    let trailingKey: string | null = null
    if (parts.length >= 3 && parts[parts.length - 1] === '' && parts[parts.length - 2] === '') {
        parts.splice(-2, 2)
        trailingKey = separator
    }

    const tokens = parts.filter((part) => part.length > 0)
    if (trailingKey) tokens.push(trailingKey)

    return { tokens, style: separator === '+' ? 'plus' : 'hyphen' }
}

/**
 * Normalize a base (non-modifier) key name.
 * Special names are mapped, function keys and single characters are uppercased.
 */
export function normalizeBaseKey(token: string): string {
    const lowered = token.toLowerCase()

    const special = specialKeys.get(lowered)
    if (special) return special

    if (/^f\d{1,2}$/.test(lowered)) return lowered.toUpperCase()

    // A modifier pressed on its own ('cmd+shift' binds Shift)
    const modifier = modifierAliases.get(lowered)
    if (modifier) return capitalize(modifier)

    if (lowered.length === 1) return lowered.toUpperCase()

    return capitalize(lowered)
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1)
}

function buildKey(modifiers: Set<Modifier>, key: string): NormalizedKey {
    const ordered = modifierOrder.filter((modifier) => modifiers.has(modifier))
    return {
        key,
        modifiers: ordered,
        canonical: composeCanonical(ordered, key),
    }
}

/**
 * Build a canonical combo string from parts. Modifiers are put in canonical order.
 */
export function composeCanonical(modifiers: readonly Modifier[], key: string): string {
    const ordered = modifierOrder.filter((modifier) => modifiers.includes(modifier))
    return [...ordered, key].filter((part) => part.length > 0).join('+')
}

/**
 * Check whether two key specifications denote the same shortcut.
 */
export function sameKey(a: string, b: string): boolean {
    return normalize(a).canonical === normalize(b).canonical
}

/**
 * Format a normalized key for display.
 * symbols: ⌃⇧A, sequences joined by 'then'
 * text: Ctrl+Shift+A
 */
export function formatKey(normalized: NormalizedKey, style: KeyFormatStyle = 'symbols'): string {
    if (normalized.sequence) {
        return normalized.sequence.map((step) => formatKey(normalize(step), style)).join(' then ')
    }

    const field = style === 'symbols' ? 'symbol' : 'text'
    const labels = normalized.modifiers.map((modifier) => modifierLabels[modifier][field])
    if (style === 'symbols') {
        return labels.join('') + normalized.key
    }
    return [...labels, normalized.key].filter((part) => part.length > 0).join('+')
}

/** Canonical modifier for an alias such as 'cmd', 'alt' or '⌃' */
export function resolveModifierAlias(alias: string): Modifier | undefined {
    return modifierAliases.get(alias.trim().toLowerCase())
}

/**
 * Canonical strings of the platform shortcuts that only the system source may bind.
 */
export function getSystemReservedKeys(): Set<string> {
    if (!reservedCanonicalKeys) {
        reservedCanonicalKeys = new Set(keyTables.reservedKeys.map((key) => normalize(key).canonical))
    }
    return reservedCanonicalKeys
}

export function isSystemReserved(canonical: string): boolean {
    return getSystemReservedKeys().has(canonical)
}

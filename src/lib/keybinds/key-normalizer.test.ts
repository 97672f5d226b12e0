/**
 * Tests for key normalization and display formatting.
 */

import { describe, it, expect } from 'vitest'
import {
    composeCanonical,
    formatKey,
    isSystemReserved,
    normalize,
    normalizeBaseKey,
    resolveModifierAlias,
    sameKey,
} from './key-normalizer'

// ============================================================================
// normalize
// ============================================================================

describe('normalize', () => {
    describe('combos', () => {
        it('puts modifiers in canonical order', () => {
            expect(normalize('cmd+shift+a')).toEqual({
                key: 'A',
                modifiers: ['shift', 'meta'],
                canonical: 'shift+meta+A',
            })
        })

        it('treats word, glyph and capitalized notations the same', () => {
            expect(normalize('⌘⇧A').canonical).toBe('shift+meta+A')
            expect(normalize('Command+Shift+A').canonical).toBe('shift+meta+A')
            expect(normalize('⇧⌘a').canonical).toBe('shift+meta+A')
        })

        it('ignores padding around separators', () => {
            expect(normalize('cmd + shift + a').canonical).toBe('shift+meta+A')
            expect(normalize('⌘ Space').canonical).toBe('meta+Space')
        })

        it('reads hyphen prefixes', () => {
            expect(normalize('C-M-a').canonical).toBe('ctrl+option+A')
            expect(normalize('M-x').canonical).toBe('option+X')
            expect(normalize('S-Tab').canonical).toBe('shift+Tab')
        })

        it("reads tmux's BTab as shift+Tab", () => {
            expect(normalize('BTab')).toEqual({ key: 'Tab', modifiers: ['shift'], canonical: 'shift+Tab' })
            expect(normalize('C-BTab').canonical).toBe('ctrl+shift+Tab')
            expect(sameKey('BTab', 'S-Tab')).toBe(true)
            expect(sameKey('BTab', 'shift+tab')).toBe(true)
            expect(sameKey('BTab', 'Tab')).toBe(false)
        })

        it('maps special key names', () => {
            expect(normalize('alt+left').canonical).toBe('option+ArrowLeft')
            expect(normalize('return').canonical).toBe('Enter')
            expect(normalize('Cmd+Space').canonical).toBe('meta+Space')
        })

        it('reads a spaced special key name as one key', () => {
            expect(normalize('page up')).toEqual({ key: 'PageUp', modifiers: [], canonical: 'PageUp' })
            expect(normalize('Page Down').canonical).toBe('PageDown')
            expect(normalize('b s').canonical).toBe('B → S')
        })

        it('uppercases function keys', () => {
            expect(normalize('F5').canonical).toBe('F5')
            expect(normalize('shift+f12').canonical).toBe('shift+F12')
        })

        it('reads a doubled trailing separator as the key', () => {
            expect(normalize('ctrl++').canonical).toBe('ctrl++')
            expect(normalize('C--').canonical).toBe('ctrl+-')
        })

        it('keeps a trailing comma as the key', () => {
            expect(normalize('ctrl+,').canonical).toBe('ctrl+,')
        })

        it('keeps unknown tokens as part of the key', () => {
            expect(normalize('ctrl+x+y').canonical).toBe('ctrl+X+Y')
            expect(normalize('hyper+k').canonical).toBe('Hyper+K')
        })

        it('returns an empty key for empty input', () => {
            expect(normalize('')).toEqual({ key: '', modifiers: [], canonical: '' })
        })
    })

    describe('sequences', () => {
        it('splits a tmux prefix sequence on whitespace', () => {
            expect(normalize('C-b c')).toEqual({
                key: '',
                modifiers: [],
                sequence: ['ctrl+B', 'C'],
                canonical: 'ctrl+B → C',
            })
        })

        it('splits on repeated plain keys', () => {
            expect(normalize('g g').canonical).toBe('G → G')
        })

        it('splits on commas and the word then', () => {
            expect(normalize('ctrl+a, ctrl+b').canonical).toBe('ctrl+A → ctrl+B')
            expect(normalize('ctrl+a then ctrl+b').canonical).toBe('ctrl+A → ctrl+B')
        })
    })

    it('is idempotent', () => {
        for (const raw of ['cmd+shift+a', 'C-b c', 'alt+left', 'ctrl++', 'g g', '⌘ Space']) {
            const once = normalize(raw).canonical
            expect(normalize(once).canonical).toBe(once)
        }
    })
})

// ============================================================================
// Helpers
// ============================================================================

describe('normalizeBaseKey', () => {
    it('maps names and uppercases characters', () => {
        expect(normalizeBaseKey('esc')).toBe('Escape')
        expect(normalizeBaseKey('f1')).toBe('F1')
        expect(normalizeBaseKey('q')).toBe('Q')
    })

    it('names a lone modifier', () => {
        expect(normalizeBaseKey('shift')).toBe('Shift')
    })
})

describe('composeCanonical', () => {
    it('orders modifiers', () => {
        expect(composeCanonical(['meta', 'ctrl'], 'K')).toBe('ctrl+meta+K')
    })

    it('drops an empty key', () => {
        expect(composeCanonical(['shift'], '')).toBe('shift')
    })
})

describe('sameKey', () => {
    it('compares canonical forms', () => {
        expect(sameKey('Cmd+Q', '⌘q')).toBe(true)
        expect(sameKey('ctrl+a', 'ctrl+shift+a')).toBe(false)
    })
})

describe('resolveModifierAlias', () => {
    it('resolves aliases case-insensitively', () => {
        expect(resolveModifierAlias('Alt')).toBe('option')
        expect(resolveModifierAlias(' command ')).toBe('meta')
        expect(resolveModifierAlias('⌃')).toBe('ctrl')
    })

    it('returns undefined for unknown names', () => {
        expect(resolveModifierAlias('hyper')).toBeUndefined()
    })
})

// ============================================================================
// Display and reserved keys
// ============================================================================

describe('formatKey', () => {
    it('uses glyphs by default', () => {
        expect(formatKey(normalize('cmd+shift+t'))).toBe('⇧⌘T')
        expect(formatKey(normalize('ctrl+shift+a'))).toBe('⌃⇧A')
        expect(formatKey(normalize('alt+cmd+left'))).toBe('⌥⌘ArrowLeft')
    })

    it('uses labels in text style', () => {
        expect(formatKey(normalize('cmd+shift+t'), 'text')).toBe('Shift+Cmd+T')
        expect(formatKey(normalize('ctrl+shift+a'), 'text')).toBe('Ctrl+Shift+A')
    })

    it('joins sequence steps', () => {
        expect(formatKey(normalize('C-b c'))).toBe('⌃B then C')
    })
})

describe('isSystemReserved', () => {
    it('matches reserved keys in canonical form', () => {
        expect(isSystemReserved('meta+Space')).toBe(true)
        expect(isSystemReserved(normalize('⌘Q').canonical)).toBe(true)
        expect(isSystemReserved(normalize('cmd+option+esc').canonical)).toBe(true)
    })

    it('does not match other keys', () => {
        expect(isSystemReserved('meta+T')).toBe(false)
    })
})

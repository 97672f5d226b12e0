/**
 * Tests for conflict detection.
 */

import { describe, it, expect } from 'vitest'
import {
    buildRegistry,
    conflictSignature,
    detectAllCollisions,
    detectKeybindCollisions,
    lookupKeybinds,
} from './collision-detector'
import { prepareKeybind } from './keybind-merger'
import type { Keybind, KeybindInput } from './types'

function keybind(input: Partial<KeybindInput> & Pick<KeybindInput, 'id' | 'key'>): Keybind {
    return prepareKeybind({ tool: 'ghostty', context: 'global', source: 'default', ...input })
}

// ============================================================================
// Registry
// ============================================================================

describe('registry', () => {
    const batch = [
        keybind({ id: 'tmux-select', tool: 'tmux', context: 'prefix', key: 'ctrl+a' }),
        keybind({ id: 'ghostty-select', tool: 'ghostty', context: 'terminal', key: 'C-a' }),
    ]

    it('indexes ids by canonical key', () => {
        const registry = buildRegistry(batch)
        expect(lookupKeybinds(registry, 'ctrl+A')).toEqual(['tmux-select', 'ghostty-select'])
    })

    it('narrows by context, tool, or both', () => {
        const registry = buildRegistry(batch)
        expect(lookupKeybinds(registry, 'ctrl+A', { context: 'prefix' })).toEqual(['tmux-select'])
        expect(lookupKeybinds(registry, 'ctrl+A', { tool: 'ghostty' })).toEqual(['ghostty-select'])
        expect(lookupKeybinds(registry, 'ctrl+A', { context: 'prefix', tool: 'ghostty' })).toEqual([])
    })

    it('returns an empty list for unknown keys', () => {
        expect(lookupKeybinds(buildRegistry([]), 'ctrl+A')).toEqual([])
    })
})

describe('conflictSignature', () => {
    it('sorts participant ids', () => {
        expect(conflictSignature('hard', 'meta+K', ['b', 'a'])).toBe('hard|meta+K|a,b')
    })
})

// ============================================================================
// Classification
// ============================================================================

describe('detectAllCollisions', () => {
    it('reports two actions in one context as a hard collision', () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'close-tab', key: 'Cmd+Shift+T', context: 'terminal', action: 'Close tab', source: 'user' }),
            keybind({ id: 'reopen-tab', key: '⌘⇧T', context: 'terminal', action: 'Reopen tab', source: 'user' }),
        ])

        expect(conflicts).toEqual([
            {
                id: 'hard|shift+meta+T|close-tab,reopen-tab',
                severity: 'error',
                type: 'hard',
                key: 'shift+meta+T',
                keybinds: ['close-tab', 'reopen-tab'],
                contexts: ['terminal'],
                tools: ['ghostty'],
                message: 'Key ⇧⌘T is bound to 2 actions in context "terminal": "Close tab", "Reopen tab"',
                suggestions: ['option+shift+meta+T', 'ctrl+shift+meta+T', 'meta+T', 'option+meta+T', 'shift+meta+R'],
            },
        ])
    })

    it('skips suggestions that are already taken', () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'a', key: 'cmd+shift+t', context: 'terminal' }),
            keybind({ id: 'b', key: 'cmd+shift+t', context: 'terminal' }),
            keybind({ id: 'c', key: 'cmd+option+shift+t', context: 'other', tool: 'tmux' }),
        ])

        expect(conflicts).toHaveLength(1)
        expect(conflicts[0].suggestions[0]).toBe('ctrl+shift+meta+T')
    })

    it('reports one default and one user record in one context as a shadow', () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'new-window', tool: 'tmux', key: 'C-b c', context: 'prefix' }),
            keybind({ id: 'kill-pane', tool: 'tmux', key: 'C-b c', context: 'prefix', source: 'user' }),
        ])

        expect(conflicts).toHaveLength(1)
        expect(conflicts[0]).toMatchObject({
            type: 'shadow',
            severity: 'info',
            keybinds: ['new-window', 'kill-pane'],
            message: 'User keybinding for ⌃B then C overrides the default in context "prefix"',
            suggestions: [],
        })
    })

    it('reports a shadow even when layering already disabled the default', () => {
        const defaultRecord = keybind({ id: 'new-window', tool: 'tmux', key: 'C-b c', context: 'prefix' })
        defaultRecord.disabled = true
        const conflicts = detectAllCollisions([
            defaultRecord,
            keybind({ id: 'kill-pane', tool: 'tmux', key: 'C-b c', context: 'prefix', source: 'user' }),
        ])

        expect(conflicts.map((conflict) => conflict.type)).toEqual(['shadow'])
    })

    it('reports three defaults in one context as one hard collision', () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'a', key: 'ctrl+k', context: 'terminal' }),
            keybind({ id: 'b', key: 'ctrl+k', context: 'terminal' }),
            keybind({ id: 'c', key: 'ctrl+k', context: 'terminal' }),
        ])

        expect(conflicts).toHaveLength(1)
        expect(conflicts[0].keybinds).toEqual(['a', 'b', 'c'])
    })

    it('ignores disabled records in a shared context', () => {
        const loser = keybind({ id: 'b', key: 'ctrl+k', context: 'terminal' })
        loser.disabled = true

        expect(detectAllCollisions([keybind({ id: 'a', key: 'ctrl+k', context: 'terminal' }), loser])).toEqual([])
    })

    it("does not report different tools' own contexts", () => {
        expect(
            detectAllCollisions([
                keybind({ id: 'clear', tool: 'ghostty', context: 'terminal', key: 'ctrl+k' }),
                keybind({ id: 'focus-up', tool: 'aerospace', context: 'main', key: 'ctrl+k' }),
            ]),
        ).toEqual([])
    })

    it('reports a key shared by tools through the global context as cross-tool', () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'focus-left', tool: 'aerospace', context: 'global', key: 'alt+h' }),
            keybind({ id: 'cursor-left', tool: 'tmux', context: 'copy-mode', key: 'M-h' }),
        ])

        expect(conflicts).toEqual([
            {
                id: 'cross-tool|option+H|cursor-left,focus-left',
                severity: 'warning',
                type: 'cross-tool',
                key: 'option+H',
                keybinds: ['focus-left', 'cursor-left'],
                contexts: ['global', 'copy-mode'],
                tools: ['aerospace', 'tmux'],
                message: 'Key ⌥H is used by aerospace, tmux in overlapping contexts',
                suggestions: [],
            },
        ])
    })

    it("reports a key reused across one tool's contexts as soft", () => {
        const conflicts = detectAllCollisions([
            keybind({ id: 'prefix-select', tool: 'tmux', context: 'prefix', key: 'ctrl+a' }),
            keybind({ id: 'copy-select', tool: 'tmux', context: 'copy-mode', key: 'ctrl+a' }),
        ])

        expect(conflicts).toHaveLength(1)
        expect(conflicts[0]).toMatchObject({
            type: 'soft',
            severity: 'warning',
            message: 'Key ⌃A is used in overlapping tmux contexts: prefix, copy-mode',
        })
    })

    it('does not report overlap when only one record is enabled', () => {
        const disabled = keybind({ id: 'cursor-left', tool: 'tmux', context: 'copy-mode', key: 'M-h' })
        disabled.disabled = true

        expect(
            detectAllCollisions([keybind({ id: 'focus-left', tool: 'aerospace', key: 'alt+h' }), disabled]),
        ).toEqual([])
    })

    describe('system-reserved keys', () => {
        const launcher = (): Keybind =>
            keybind({ id: 'launcher', tool: 'raycast', key: 'Cmd+Space', source: 'user' })

        it('reports a non-system record as an error', () => {
            const conflicts = detectAllCollisions([launcher()])

            expect(conflicts).toHaveLength(1)
            expect(conflicts[0]).toMatchObject({
                id: 'system|meta+Space|launcher',
                type: 'system',
                severity: 'error',
                keybinds: ['launcher'],
                message: "⌘Space is reserved by the system and can't be bound by raycast",
            })
            expect(conflicts[0].suggestions[0]).toBe('shift+meta+Space')
        })

        it('downgrades to a warning only when deferring and overrides are allowed', () => {
            expect(
                detectAllCollisions([launcher()], {
                    reservedKeyPolicy: 'defer-to-overrides',
                    allowSystemOverrides: true,
                })[0].severity,
            ).toBe('warning')
            expect(detectAllCollisions([launcher()], { reservedKeyPolicy: 'defer-to-overrides' })[0].severity).toBe(
                'error',
            )
            expect(detectAllCollisions([launcher()], { allowSystemOverrides: true })[0].severity).toBe('error')
        })

        it('accepts system records', () => {
            expect(detectAllCollisions([keybind({ id: 'spotlight', key: 'cmd+space', source: 'system' })])).toEqual(
                [],
            )
        })
    })

    it('gives the same result for the same batch', () => {
        const batch = [
            keybind({ id: 'a', key: 'ctrl+k', context: 'terminal' }),
            keybind({ id: 'b', key: 'ctrl+k', context: 'terminal' }),
            keybind({ id: 'c', key: 'cmd+q', source: 'user' }),
        ]
        expect(detectAllCollisions(batch)).toEqual(detectAllCollisions(batch))
    })
})

// ============================================================================
// Single candidate
// ============================================================================

describe('detectKeybindCollisions', () => {
    const batch = [keybind({ id: 'new-tab', key: 'cmd+t', context: 'terminal' })]

    it('reports conflicts the candidate takes part in', () => {
        const candidate = keybind({ id: 'new-split', key: '⌘T', context: 'terminal' })
        const conflicts = detectKeybindCollisions(candidate, batch)

        expect(conflicts).toHaveLength(1)
        expect(conflicts[0].type).toBe('hard')
        expect(conflicts[0].keybinds).toEqual(['new-split', 'new-tab'])
    })

    it('returns nothing for a free key', () => {
        expect(detectKeybindCollisions(keybind({ id: 'new-split', key: 'cmd+d', context: 'terminal' }), batch)).toEqual(
            [],
        )
    })

    it('ignores the record the candidate replaces', () => {
        expect(detectKeybindCollisions(keybind({ id: 'new-tab', key: 'cmd+t', context: 'terminal' }), batch)).toEqual(
            [],
        )
    })

    it('reports reserved keys', () => {
        const conflicts = detectKeybindCollisions(keybind({ id: 'quit', key: 'cmd+q', source: 'user' }), batch)
        expect(conflicts.map((conflict) => conflict.type)).toEqual(['system'])
    })
})

import { describe, it, expect } from 'vitest'
import { ConfigFileError } from './errors'
import { prepareKeybind } from './keybind-merger'
import type { Keybind, KeybindInput } from './types'
import { applyRules, loadRulesFile, parseRulesFile } from './validation-rules'

function keybind(input: Partial<KeybindInput> & Pick<KeybindInput, 'id' | 'key'>): Keybind {
    return prepareKeybind({ tool: 'aerospace', context: 'global', source: 'user', ...input })
}

function parseError(text: string): ConfigFileError {
    try {
        parseRulesFile(text, 'rules.json')
    } catch (error) {
        if (error instanceof ConfigFileError) return error
        throw error
    }
    throw new Error('Expected a ConfigFileError')
}

// ============================================================================
// Rules files
// ============================================================================

describe('parseRulesFile', () => {
    it('fills defaults and resolves modifier aliases', () => {
        const rules = parseRulesFile(
            JSON.stringify({
                rules: [
                    { kind: 'required-modifiers', modifiers: ['cmd', 'Alt'] },
                    { kind: 'forbidden-keys', keys: ['F1'] },
                    { kind: 'context-isolation', contexts: ['copy-mode'] },
                    { kind: 'ergonomics', difficultKeys: ['F2'] },
                ],
            }),
            'rules.json',
        )

        expect(rules).toEqual([
            { kind: 'required-modifiers', modifiers: ['meta', 'option'], contexts: ['global'] },
            { kind: 'forbidden-keys', keys: ['F1'], severity: 'error' },
            { kind: 'context-isolation', contexts: ['copy-mode'] },
            { kind: 'ergonomics', maxModifiers: 3, difficultKeys: ['F2'] },
        ])
    })

    it('rejects an unknown rule kind', () => {
        const error = parseError('{"rules":[{"kind":"shout"}]}')
        expect(error.path).toBe('rules.json')
        expect(error.reason).toMatch(/^rules\.0\.kind: Invalid discriminator value/)
    })

    it('rejects an unknown modifier', () => {
        const error = parseError('{"rules":[{"kind":"required-modifiers","modifiers":["hyper"]}]}')
        expect(error.reason).toBe("rules.0.modifiers.0: Unknown modifier 'hyper'")
    })

    it('rejects invalid JSON', () => {
        expect(parseError('{"rules":').reason).toMatch(/^invalid JSON: /)
    })
})

describe('loadRulesFile', () => {
    it('reports a missing file as a ConfigFileError', async () => {
        await expect(loadRulesFile('/nonexistent/keybind-rules.json')).rejects.toThrow(ConfigFileError)
    })
})

// ============================================================================
// Rule checks
// ============================================================================

describe('applyRules', () => {
    describe('required-modifiers', () => {
        it('reports records in the listed contexts that lack a modifier', () => {
            const violations = applyRules(
                [
                    keybind({ id: 'focus-up', key: 'ctrl+k' }),
                    keybind({ id: 'focus-down', key: 'cmd+ctrl+j' }),
                    keybind({ id: 'copy', tool: 'tmux', key: 'ctrl+x', context: 'prefix' }),
                ],
                [{ kind: 'required-modifiers', modifiers: ['meta'], contexts: ['global'] }],
            )

            expect(violations).toEqual([
                {
                    id: 'required-modifiers|ctrl+K|focus-up',
                    rule: 'required-modifiers',
                    severity: 'error',
                    key: 'ctrl+K',
                    keybinds: ['focus-up'],
                    contexts: ['global'],
                    tools: ['aerospace'],
                    message: 'focus-up in context "global" is missing required modifiers: meta',
                    suggestions: ['ctrl+meta+K'],
                },
            ])
        })

        it('checks the first step of a sequence', () => {
            const batch = [keybind({ id: 'new-window', tool: 'tmux', key: 'C-b c' })]

            expect(applyRules(batch, [{ kind: 'required-modifiers', modifiers: ['ctrl'], contexts: ['global'] }])).toEqual(
                [],
            )
            const [violation] = applyRules(batch, [
                { kind: 'required-modifiers', modifiers: ['meta'], contexts: ['global'] },
            ])
            expect(violation.suggestions).toEqual([])
        })
    })

    it('reports forbidden keys by combo or base key', () => {
        const violations = applyRules(
            [
                keybind({ id: 'help', key: 'shift+f1' }),
                keybind({ id: 'quit', key: 'Command+Q' }),
                keybind({ id: 'select', key: 'ctrl+a' }),
            ],
            [{ kind: 'forbidden-keys', keys: ['F1', 'cmd+q'], severity: 'warning' }],
        )

        expect(violations.map((v) => [v.id, v.severity, v.message])).toEqual([
            ['forbidden-keys|shift+F1|help', 'warning', 'help uses forbidden key shift+F1'],
            ['forbidden-keys|meta+Q|quit', 'warning', 'quit uses forbidden key meta+Q'],
        ])
    })

    it('reports keys reused outside an isolated context', () => {
        const violations = applyRules(
            [
                keybind({ id: 'copy-select', tool: 'tmux', key: 'ctrl+a', context: 'copy-mode' }),
                keybind({ id: 'focus-all', key: 'ctrl+a' }),
                keybind({ id: 'focus-back', key: 'ctrl+b' }),
            ],
            [{ kind: 'context-isolation', contexts: ['copy-mode'] }],
        )

        expect(violations).toEqual([
            {
                id: 'context-isolation|copy-mode|ctrl+A|focus-all',
                rule: 'context-isolation',
                severity: 'warning',
                key: 'ctrl+A',
                keybinds: ['focus-all', 'copy-select'],
                contexts: ['global', 'copy-mode'],
                tools: ['aerospace', 'tmux'],
                message: 'focus-all reuses ctrl+A, which is isolated to context "copy-mode"',
                suggestions: [],
            },
        ])
    })

    it('reports too many modifiers and difficult keys', () => {
        const violations = applyRules(
            [keybind({ id: 'hyper-k', key: 'ctrl+option+shift+cmd+k' }), keybind({ id: 'rename', key: 'F2' })],
            [{ kind: 'ergonomics', maxModifiers: 3, difficultKeys: ['f2'] }],
        )

        expect(violations.map((v) => [v.id, v.severity, v.message])).toEqual([
            ['ergonomics|modifiers|hyper-k', 'warning', 'hyper-k uses 4 modifiers (max 3)'],
            ['ergonomics|difficult-key|rename', 'info', 'rename uses hard-to-reach key F2'],
        ])
    })

    it('skips disabled records', () => {
        const disabled = keybind({ id: 'help', key: 'F1' })
        disabled.disabled = true

        expect(applyRules([disabled], [{ kind: 'forbidden-keys', keys: ['F1'], severity: 'error' }])).toEqual([])
    })
})

import { describe, it, expect } from 'vitest'
import { ConfigFileError } from '$lib/keybinds/errors'
import { combineLayers, flattenLayers, parseKeybindFile } from './input-loader'

describe('parseKeybindFile', () => {
    it('groups a flat record list by tool and source', () => {
        const layers = parseKeybindFile(
            JSON.stringify({
                keybinds: [
                    { id: 'new-window', tool: 'tmux', key: 'C-b c', source: 'default', context: 'prefix' },
                    { id: 'kill-pane', tool: 'tmux', key: 'C-b x', source: 'user' },
                ],
            }),
            'keybinds.json',
        )

        expect(layers).toEqual({
            tmux: {
                defaults: [{ id: 'new-window', tool: 'tmux', key: 'C-b c', source: 'default', context: 'prefix' }],
                user: [{ id: 'kill-pane', tool: 'tmux', key: 'C-b x', source: 'user', context: 'global' }],
            },
        })
    })

    it('fills tool and source from the position in a tools file', () => {
        const layers = parseKeybindFile(
            JSON.stringify({
                tools: {
                    ghostty: {
                        defaults: [{ id: 'new-tab', key: 'cmd+t', context: 'terminal' }],
                        generated: [{ id: 'gen-split', key: 'cmd+d' }],
                    },
                },
            }),
            'ghostty.json',
        )

        expect(layers).toEqual({
            ghostty: {
                defaults: [{ id: 'new-tab', tool: 'ghostty', key: 'cmd+t', source: 'default', context: 'terminal' }],
                generated: [{ id: 'gen-split', tool: 'ghostty', key: 'cmd+d', source: 'generated', context: 'global' }],
            },
        })
    })

    it('keeps an explicit source in a tools file', () => {
        const layers = parseKeybindFile(
            JSON.stringify({ tools: { tmux: { user: [{ id: 'a', key: 'C-a', source: 'generated' }] } } }),
            'tmux.json',
        )
        expect(layers.tmux.user?.[0].source).toBe('generated')
    })

    it('names the failing field', () => {
        expect(() =>
            parseKeybindFile(JSON.stringify({ keybinds: [{ id: 'a', tool: 'tmux', key: 'C-a' }] }), 'flat.json'),
        ).toThrow("Can't use 'flat.json': keybinds.0.source: Required")
    })

    it('rejects invalid JSON', () => {
        expect(() => parseKeybindFile('{', 'broken.json')).toThrow(ConfigFileError)
    })
})

describe('combineLayers', () => {
    it('concatenates layers tool by tool in file order', () => {
        const a = { id: 'a', tool: 'tmux', key: 'C-a', context: 'global', source: 'default' } as const
        const b = { id: 'b', tool: 'tmux', key: 'C-b', context: 'global', source: 'default' } as const
        const c = { id: 'c', tool: 'tmux', key: 'C-c', context: 'global', source: 'user' } as const

        expect(combineLayers([{ tmux: { defaults: [a] } }, { tmux: { defaults: [b], user: [c] } }])).toEqual({
            tmux: { defaults: [a, b], user: [c] },
        })
    })
})

describe('flattenLayers', () => {
    it('lists records in layering order', () => {
        const record = (id: string, source: 'system' | 'default' | 'user' | 'generated') => ({
            id,
            tool: 'tmux',
            key: 'C-a',
            context: 'global',
            source,
        })

        const flat = flattenLayers({
            tmux: {
                generated: [record('gen', 'generated')],
                user: [record('user', 'user')],
                system: [record('sys', 'system')],
                defaults: [record('def', 'default')],
            },
        })
        expect(flat.map((input) => input.id)).toEqual(['sys', 'def', 'user', 'gen'])
    })
})

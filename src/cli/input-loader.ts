/**
 * Keybind input files.
 *
 * Two shapes are accepted:
 *   { "keybinds": [ { id, tool, key, source, ... } ] }
 *   { "tools": { "<tool>": { "system"?: [...], "defaults"?: [...], "user"?: [...], "generated"?: [...] } } }
 * In the second shape a record's tool and source default to its place in the file.
 */

import { z } from 'zod'
import { GLOBAL_CONTEXT } from '$lib/keybinds/context-scope'
import { ConfigFileError, formatSchemaIssues, parseConfigJson } from '$lib/keybinds/errors'
import { groupIntoLayers } from '$lib/keybinds/keybind-merger'
import { keybindSources, type KeybindInput, type KeybindSource, type ToolLayers } from '$lib/keybinds/types'

const layeredRecordSchema = z.object({
    id: z.string().min(1),
    tool: z.string().min(1).optional(),
    key: z.string().min(1),
    action: z.string().optional(),
    context: z.string().min(1).default(GLOBAL_CONTEXT),
    source: z.enum(keybindSources).optional(),
    category: z.string().optional(),
    tags: z.array(z.string()).optional(),
    frequency: z.enum(['high', 'medium', 'low']).optional(),
    difficulty: z.enum(['beginner', 'intermediate', 'advanced']).optional(),
    sourceFile: z.string().optional(),
    sourceLine: z.number().int().nonnegative().optional(),
    disabled: z.boolean().optional(),
    conflicts: z.array(z.string()).optional(),
})

const flatRecordSchema = layeredRecordSchema.extend({
    tool: z.string().min(1),
    source: z.enum(keybindSources),
})

const flatFileSchema = z.object({
    keybinds: z.array(flatRecordSchema),
})

const layerSchema = z.array(layeredRecordSchema).optional()

const toolsFileSchema = z.object({
    tools: z.record(
        z.string(),
        z.object({
            system: layerSchema,
            defaults: layerSchema,
            user: layerSchema,
            generated: layerSchema,
        }),
    ),
})

type LayeredRecord = z.infer<typeof layeredRecordSchema>

const layerNames = ['system', 'defaults', 'user', 'generated'] as const

const layerSources = {
    system: 'system',
    defaults: 'default',
    user: 'user',
    generated: 'generated',
} as const satisfies Record<keyof ToolLayers, KeybindSource>

/**
 * Parse one input file into per-tool layers.
 * @param path - Only used in error messages
 * @throws ConfigFileError on invalid JSON or a schema mismatch
 */
export function parseKeybindFile(text: string, path: string): Record<string, ToolLayers> {
    const raw = parseConfigJson(text, path)

    if (typeof raw === 'object' && raw !== null && 'keybinds' in raw) {
        const parsed = flatFileSchema.safeParse(raw)
        if (!parsed.success) throw new ConfigFileError(path, formatSchemaIssues(parsed.error))
        return groupIntoLayers(parsed.data.keybinds)
    }

    const parsed = toolsFileSchema.safeParse(raw)
    if (!parsed.success) throw new ConfigFileError(path, formatSchemaIssues(parsed.error))

    const result: Record<string, ToolLayers> = {}
    for (const [tool, layers] of Object.entries(parsed.data.tools)) {
        const toolLayers: ToolLayers = {}
        for (const layer of layerNames) {
            const records = layers[layer]
            if (records) {
                toolLayers[layer] = records.map((record) => fillRecord(record, tool, layerSources[layer]))
            }
        }
        result[tool] = toolLayers
    }
    return result
}

function fillRecord(record: LayeredRecord, tool: string, source: KeybindSource): KeybindInput {
    return { ...record, tool: record.tool ?? tool, source: record.source ?? source }
}

/**
 * Concatenate several files' layers, tool by tool and layer by layer, in file order.
 */
export function combineLayers(files: ReadonlyArray<Record<string, ToolLayers>>): Record<string, ToolLayers> {
    const combined: Record<string, ToolLayers> = {}

    for (const file of files) {
        for (const [tool, layers] of Object.entries(file)) {
            const target = (combined[tool] ??= {})
            target.system = concatLayer(target.system, layers.system)
            target.defaults = concatLayer(target.defaults, layers.defaults)
            target.user = concatLayer(target.user, layers.user)
            target.generated = concatLayer(target.generated, layers.generated)
        }
    }

    return combined
}

function concatLayer(a: KeybindInput[] | undefined, b: KeybindInput[] | undefined): KeybindInput[] | undefined {
    if (!a) return b ? [...b] : undefined
    return b ? [...a, ...b] : a
}

/**
 * Every record of every tool, in layering order.
 */
export function flattenLayers(toolLayers: Record<string, ToolLayers>): KeybindInput[] {
    return Object.values(toolLayers).flatMap((layers) => [
        ...(layers.system ?? []),
        ...(layers.defaults ?? []),
        ...(layers.user ?? []),
        ...(layers.generated ?? []),
    ])
}

/**
 * Custom validation rules, loaded from a JSON rules file.
 *
 * Rules are a closed union keyed by `kind`. Adding a kind means adding a schema here and a case
 * in checkRule; the compiler flags the missing case.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { GLOBAL_CONTEXT } from './context-scope'
import { ConfigFileError, formatSchemaIssues, parseConfigJson } from './errors'
import keyTables from './key-tables.json'
import { composeCanonical, normalize, normalizeBaseKey, resolveModifierAlias } from './key-normalizer'
import type { Keybind, Modifier, RuleViolation } from './types'

// ============================================================================
// Schemas
// ============================================================================

const modifierSchema = z.string().transform((value, ctx): Modifier => {
    const modifier = resolveModifierAlias(value)
    if (!modifier) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown modifier '${value}'` })
        return z.NEVER
    }
    return modifier
})

const requiredModifiersRuleSchema = z.object({
    kind: z.literal('required-modifiers'),
    modifiers: z.array(modifierSchema).min(1),
    contexts: z.array(z.string()).default([GLOBAL_CONTEXT]),
})

const forbiddenKeysRuleSchema = z.object({
    kind: z.literal('forbidden-keys'),
    keys: z.array(z.string()).min(1),
    severity: z.enum(['error', 'warning', 'info']).default('error'),
})

const contextIsolationRuleSchema = z.object({
    kind: z.literal('context-isolation'),
    contexts: z.array(z.string()).min(1),
})

const ergonomicsRuleSchema = z.object({
    kind: z.literal('ergonomics'),
    maxModifiers: z.number().int().min(1).default(3),
    difficultKeys: z.array(z.string()).default(keyTables.awkwardKeys),
})

export const validationRuleSchema = z.discriminatedUnion('kind', [
    requiredModifiersRuleSchema,
    forbiddenKeysRuleSchema,
    contextIsolationRuleSchema,
    ergonomicsRuleSchema,
])

export const rulesFileSchema = z.object({
    rules: z.array(validationRuleSchema),
})

export type ValidationRule = z.infer<typeof validationRuleSchema>
export type RequiredModifiersRule = z.infer<typeof requiredModifiersRuleSchema>
export type ForbiddenKeysRule = z.infer<typeof forbiddenKeysRuleSchema>
export type ContextIsolationRule = z.infer<typeof contextIsolationRuleSchema>
export type ErgonomicsRule = z.infer<typeof ergonomicsRuleSchema>

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse the text of a rules file.
 * @param path - Only used in error messages
 * @throws ConfigFileError on invalid JSON or a schema mismatch (including an unknown rule kind)
 */
export function parseRulesFile(text: string, path: string): ValidationRule[] {
    const raw = parseConfigJson(text, path)

    const parsed = rulesFileSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigFileError(path, formatSchemaIssues(parsed.error))
    }
    return parsed.data.rules
}

export async function loadRulesFile(path: string): Promise<ValidationRule[]> {
    let text: string
    try {
        text = await readFile(path, 'utf8')
    } catch (error) {
        throw new ConfigFileError(path, error instanceof Error ? error.message : String(error))
    }
    return parseRulesFile(text, path)
}

// ============================================================================
// Checking
// ============================================================================

/**
 * Run every rule over the enabled records of a batch.
 */
export function applyRules(batch: readonly Keybind[], rules: readonly ValidationRule[]): RuleViolation[] {
    const enabled = batch.filter((keybind) => !keybind.disabled)
    return rules.flatMap((rule) => checkRule(enabled, rule))
}

function checkRule(batch: readonly Keybind[], rule: ValidationRule): RuleViolation[] {
    switch (rule.kind) {
        case 'required-modifiers':
            return checkRequiredModifiers(batch, rule)
        case 'forbidden-keys':
            return checkForbiddenKeys(batch, rule)
        case 'context-isolation':
            return checkContextIsolation(batch, rule)
        case 'ergonomics':
            return checkErgonomics(batch, rule)
        default:
            return assertNever(rule)
    }
}

function assertNever(value: never): never {
    throw new Error(`Unhandled rule: ${JSON.stringify(value)}`)
}

/** For a sequence the prefix step carries the modifiers ('C-b c' needs ctrl on 'C-b') */
function leadingModifiers(keybind: Keybind): Modifier[] {
    if (keybind.sequence && keybind.sequence.length > 0) {
        return normalize(keybind.sequence[0]).modifiers
    }
    return keybind.modifiers
}

function checkRequiredModifiers(batch: readonly Keybind[], rule: RequiredModifiersRule): RuleViolation[] {
    const violations: RuleViolation[] = []

    for (const keybind of batch) {
        if (!rule.contexts.includes(keybind.context)) continue
        const present = leadingModifiers(keybind)
        const missing = rule.modifiers.filter((modifier) => !present.includes(modifier))
        if (missing.length === 0) continue

        violations.push({
            id: `required-modifiers|${keybind.canonical}|${keybind.id}`,
            rule: 'required-modifiers',
            severity: 'error',
            key: keybind.canonical,
            keybinds: [keybind.id],
            contexts: [keybind.context],
            tools: [keybind.tool],
            message: `${keybind.id} in context "${keybind.context}" is missing required modifiers: ${missing.join(', ')}`,
            suggestions: keybind.sequence ? [] : [composeCanonical([...present, ...missing], keybind.baseKey)],
        })
    }

    return violations
}

function checkForbiddenKeys(batch: readonly Keybind[], rule: ForbiddenKeysRule): RuleViolation[] {
    const forbidden = new Set(rule.keys.map((key) => normalize(key).canonical))

    return batch
        .filter((keybind) => forbidden.has(keybind.canonical) || forbidden.has(keybind.baseKey))
        .map((keybind) => ({
            id: `forbidden-keys|${keybind.canonical}|${keybind.id}`,
            rule: 'forbidden-keys' as const,
            severity: rule.severity,
            key: keybind.canonical,
            keybinds: [keybind.id],
            contexts: [keybind.context],
            tools: [keybind.tool],
            message: `${keybind.id} uses forbidden key ${keybind.canonical}`,
            suggestions: [],
        }))
}

function checkContextIsolation(batch: readonly Keybind[], rule: ContextIsolationRule): RuleViolation[] {
    const violations: RuleViolation[] = []

    for (const context of rule.contexts) {
        const isolated = new Map<string, string[]>()
        for (const keybind of batch) {
            if (keybind.context !== context) continue
            isolated.set(keybind.canonical, [...(isolated.get(keybind.canonical) ?? []), keybind.id])
        }

        for (const keybind of batch) {
            const owners = isolated.get(keybind.canonical)
            if (keybind.context === context || !owners) continue

            violations.push({
                id: `context-isolation|${context}|${keybind.canonical}|${keybind.id}`,
                rule: 'context-isolation',
                severity: 'warning',
                key: keybind.canonical,
                keybinds: [keybind.id, ...owners],
                contexts: [keybind.context, context],
                tools: [...new Set([keybind.tool, ...batch.filter((kb) => owners.includes(kb.id)).map((kb) => kb.tool)])],
                message: `${keybind.id} reuses ${keybind.canonical}, which is isolated to context "${context}"`,
                suggestions: [],
            })
        }
    }

    return violations
}

function checkErgonomics(batch: readonly Keybind[], rule: ErgonomicsRule): RuleViolation[] {
    const difficult = new Set(rule.difficultKeys.map((key) => normalizeBaseKey(key)))
    const violations: RuleViolation[] = []

    for (const keybind of batch) {
        const base = {
            key: keybind.canonical,
            keybinds: [keybind.id],
            contexts: [keybind.context],
            tools: [keybind.tool],
            suggestions: [],
        }

        if (keybind.modifiers.length > rule.maxModifiers) {
            violations.push({
                ...base,
                id: `ergonomics|modifiers|${keybind.id}`,
                rule: 'ergonomics',
                severity: 'warning',
                message: `${keybind.id} uses ${String(keybind.modifiers.length)} modifiers (max ${String(rule.maxModifiers)})`,
            })
        }
        if (difficult.has(keybind.baseKey)) {
            violations.push({
                ...base,
                id: `ergonomics|difficult-key|${keybind.id}`,
                rule: 'ergonomics',
                severity: 'info',
                message: `${keybind.id} uses hard-to-reach key ${keybind.baseKey}`,
            })
        }
    }

    return violations
}

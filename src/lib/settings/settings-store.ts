/**
 * Settings loading.
 * A settings file is a flat JSON object keyed by setting ID. Every setting is optional;
 * unknown IDs are logged and skipped, invalid values throw.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigFileError, formatSchemaIssues, parseConfigJson } from '$lib/keybinds/errors'
import type { MergeOptions } from '$lib/keybinds/types'
import { getAppLogger } from '$lib/logger'
import { getDefaultSettings, isSettingId, isValidSettingValue, validateSettingValue } from './settings-registry'
import type { SettingId, SettingsValues } from './types'

const log = getAppLogger('settings')

const settingsFileSchema = z.record(z.string(), z.unknown())

/**
 * Layer overrides over the defaults.
 * @throws SettingValidationError for a value that fails its setting's constraints
 */
export function resolveSettings(overrides: Record<string, unknown> = {}): SettingsValues {
    const settings = getDefaultSettings()

    for (const [id, value] of Object.entries(overrides)) {
        if (!isSettingId(id)) {
            log.warn('Unknown setting {id} ignored', { id })
            continue
        }
        applySetting(settings, id, value)
    }

    return settings
}

function applySetting<K extends SettingId>(settings: SettingsValues, id: K, value: unknown): void {
    // Throws with the reason; the guard below only narrows the type
    validateSettingValue(id, value)
    if (isValidSettingValue(id, value)) {
        settings[id] = value
    }
}

/**
 * Load settings from a JSON file. No path, or a missing file, gives the defaults.
 * @throws ConfigFileError if the file can't be read or isn't a JSON object
 * @throws SettingValidationError for an invalid value
 */
export async function loadSettings(path?: string): Promise<SettingsValues> {
    if (path === undefined) {
        return getDefaultSettings()
    }

    let text: string
    try {
        text = await readFile(path, 'utf8')
    } catch (error) {
        if (isFileNotFound(error)) {
            log.debug('No settings file at {path}, using defaults', { path })
            return getDefaultSettings()
        }
        throw new ConfigFileError(path, error instanceof Error ? error.message : String(error))
    }

    return parseSettingsFile(text, path)
}

/**
 * Parse the text of a settings file and layer it over the defaults.
 * @param path - Only used in messages
 */
export function parseSettingsFile(text: string, path: string): SettingsValues {
    const raw = parseConfigJson(text, path)

    const parsed = settingsFileSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigFileError(path, formatSchemaIssues(parsed.error))
    }

    log.debug('Loaded {count} settings from {path}', { count: Object.keys(parsed.data).length, path })
    return resolveSettings(parsed.data)
}

function isFileNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Map settings onto merge options.
 */
export function toMergeOptions(settings: SettingsValues): MergeOptions {
    return {
        resolveConflicts: settings['merge.resolveConflicts'],
        prioritizeUserConfig: settings['merge.prioritizeUserConfig'],
        allowSystemOverrides: settings['merge.allowSystemOverrides'],
        preserveDisabled: settings['merge.preserveDisabled'],
        generateSuggestions: settings['merge.generateSuggestions'],
        reservedKeyPolicy: settings['detection.reservedKeyPolicy'],
        maxAlternatives: settings['suggestions.maxAlternatives'],
        maxModifiers: settings['suggestions.maxModifiers'],
        patternConsistencyThreshold: settings['suggestions.patternConsistencyThreshold'],
    }
}

/**
 * Settings module public API.
 */

// Types
export type { EnumOption, SettingConstraints, SettingDefinition, SettingId, SettingsValues, SettingType } from './types'

export { SettingValidationError } from './types'

// Registry
export {
    getDefaultSettings,
    getDefaultValue,
    getSettingDefinition,
    isSettingId,
    isValidSettingValue,
    settingsRegistry,
    validateSettingValue,
} from './settings-registry'

// Store
export { loadSettings, parseSettingsFile, resolveSettings, toMergeOptions } from './settings-store'

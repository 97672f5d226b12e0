/**
 * Logging configuration using LogTape.
 *
 * Usage:
 *   import { getAppLogger } from '$lib/logger'
 *   const log = getAppLogger('merger')
 *   log.debug('Layering {count} records for {tool}', { count, tool })
 *   log.info('Merged {count} keybinds', { count })
 *   log.warn('Unknown setting {id} ignored', { id })
 *   log.error('Failed to load: {error}', { error })
 *
 * Log levels (in order): debug < info < warning < error < fatal
 *
 * Default behavior:
 *   - Normal mode: warning+ for all, but specific features can enable debug
 *   - Verbose mode (`logging.verbose` setting or `--verbose`): debug for all categories
 *   - Nothing configured (library use, tests): LogTape drops every record
 *
 * To enable debug logs for a feature, add it to debugCategories below.
 *
 * @module logger
 */

import { configure, getConsoleSink, getLogger as getLogTapeLogger } from '@logtape/logtape'
import type { Logger } from '@logtape/logtape'

export type { Logger } from '@logtape/logtape'

/**
 * Features that should have debug logging enabled even in normal mode.
 *
 * Example: ['merger', 'detector'] enables debug for those features.
 */
const debugCategories: string[] = [
    // 'merger',
    // 'detector',
    // 'suggestions',
]

let verboseLoggingEnabled = false
let loggerInitialized = false

export interface LoggerOptions {
    verbose?: boolean
}

/**
 * Build and apply logger configuration.
 * @param isReset - Whether this is a reconfiguration (requires reset flag)
 */
async function applyLoggerConfig(verbose: boolean, isReset: boolean): Promise<void> {
    const loggers: Array<{
        category: string | string[]
        lowestLevel: 'debug' | 'info' | 'warning' | 'error'
        sinks: string[]
    }> = [
        // LogTape reports its own problems here
        { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ]

    if (verbose) {
        loggers.push({
            category: 'app',
            lowestLevel: 'debug',
            sinks: ['console'],
        })
    } else {
        loggers.push({
            category: 'app',
            lowestLevel: 'warning',
            sinks: ['console'],
        })

        for (const cat of debugCategories) {
            loggers.push({
                category: ['app', cat],
                lowestLevel: 'debug',
                sinks: ['console'],
            })
        }
    }

    await configure({
        sinks: {
            console: getConsoleSink(),
        },
        loggers,
        reset: isReset,
    })
}

/**
 * Initialize the logging system. Call once from the CLI entry point.
 * Calling again with a different verbosity reconfigures.
 */
export async function initLogger(options: LoggerOptions = {}): Promise<void> {
    const verbose = options.verbose === true

    if (loggerInitialized) {
        await setVerboseLogging(verbose)
        return
    }

    verboseLoggingEnabled = verbose
    await applyLoggerConfig(verbose, false)
    loggerInitialized = true

    const log = getLogTapeLogger(['app', 'logger'])
    if (verbose) {
        log.debug('Logger initialized (verbose mode, debug+ for all)')
    } else if (debugCategories.length > 0) {
        log.debug('Debug enabled for: {categories}', { categories: debugCategories.join(', ') })
    }
}

/**
 * Enable or disable verbose logging at runtime.
 */
export async function setVerboseLogging(enabled: boolean): Promise<void> {
    if (enabled === verboseLoggingEnabled) {
        return
    }

    verboseLoggingEnabled = enabled
    await applyLoggerConfig(enabled, true)

    const log = getLogTapeLogger(['app', 'logger'])
    log.debug('Verbose logging {state}', { state: enabled ? 'enabled' : 'disabled' })
}

/**
 * Get a logger for a specific feature.
 * Categories are hierarchical, for example ['app', 'merger'].
 *
 * @example
 * const log = getAppLogger('detector')
 * log.debug('Indexed {count} records', { count })
 */
export function getAppLogger(feature: string): Logger {
    return getLogTapeLogger(['app', feature])
}

/**
 * Command runner for the keybinds CLI.
 * Everything the commands touch outside the process goes through CliIo, so tests can run them in memory.
 */

import { parseArgs } from 'node:util'
import {
    ConfigFileError,
    formatReport,
    InvalidKeybindError,
    isReportFormat,
    merge,
    parseRulesFile,
    prepareKeybind,
    rankSuggestions,
    validateConfiguration,
    type KeybindSuggestion,
    type ToolLayers,
    type ValidationRule,
} from '$lib/keybinds'
import { getAppLogger } from '$lib/logger'
import {
    getDefaultSettings,
    parseSettingsFile,
    SettingValidationError,
    toMergeOptions,
    type SettingsValues,
} from '$lib/settings'
import { combineLayers, flattenLayers, parseKeybindFile } from './input-loader'

const log = getAppLogger('cli')

export interface CliIo {
    stdout: (text: string) => void
    stderr: (text: string) => void
    readFile: (path: string) => Promise<string>
    writeFile: (path: string, text: string) => Promise<void>
    now: () => Date
    /** Called once before a command runs; the entry point wires this to the logger */
    configureLogging?: (verbose: boolean) => Promise<void>
}

/** Exit codes: 0 ok, 1 the configuration has problems, 2 the command couldn't run */
export const ExitCode = {
    Ok: 0,
    Failed: 1,
    UsageError: 2,
} as const
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

const DEFAULT_SUGGESTION_LIMIT = 10

export const usage = `Usage: keybinds <command> <files...> [options]

Commands:
  validate <files...>   Check keybinds for conflicts
      --rules <file>        Custom validation rules (JSON)
      -f, --format <fmt>    Report format: text, json, junit (default: text)
      --strict              Fail on warnings too
      --settings <file>     Settings file (JSON)
  merge <files...>      Merge keybinds into one configuration (JSON)
      -o, --out <file>      Write to a file instead of stdout
      --no-resolve          Report hard collisions instead of resolving them
      --settings <file>     Settings file (JSON)
  suggest <files...>    List ranked suggestions
      --tool <name>         Only suggestions for this tool
      --limit <n>           How many to print (default: ${String(DEFAULT_SUGGESTION_LIMIT)})
      --settings <file>     Settings file (JSON)

Options:
  -v, --verbose         Debug logging
  -h, --help            Show this help`

const optionsConfig = {
    rules: { type: 'string' },
    format: { type: 'string', short: 'f' },
    strict: { type: 'boolean' },
    out: { type: 'string', short: 'o' },
    'no-resolve': { type: 'boolean' },
    settings: { type: 'string' },
    tool: { type: 'string' },
    limit: { type: 'string' },
    verbose: { type: 'boolean', short: 'v' },
    help: { type: 'boolean', short: 'h' },
} as const

type ParsedValues = ReturnType<typeof parseCommandLine>['values']

function parseCommandLine(argv: string[]) {
    return parseArgs({ args: argv, options: optionsConfig, allowPositionals: true })
}

/**
 * Run one CLI invocation and return its exit code. Never calls process.exit.
 */
export async function runCli(argv: string[], io: CliIo): Promise<ExitCode> {
    let parsed: ReturnType<typeof parseCommandLine>
    try {
        parsed = parseCommandLine(argv)
    } catch (error) {
        io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${usage}`)
        return ExitCode.UsageError
    }

    const { values, positionals } = parsed
    const [command, ...files] = positionals

    if (values.help || command === undefined) {
        io.stdout(usage)
        return values.help ? ExitCode.Ok : ExitCode.UsageError
    }

    try {
        switch (command) {
            case 'validate':
                return await runValidate(files, values, io)
            case 'merge':
                return await runMerge(files, values, io)
            case 'suggest':
                return await runSuggest(files, values, io)
            default:
                io.stderr(`Unknown command '${command}'\n\n${usage}`)
                return ExitCode.UsageError
        }
    } catch (error) {
        if (
            error instanceof ConfigFileError ||
            error instanceof InvalidKeybindError ||
            error instanceof SettingValidationError ||
            error instanceof UsageError
        ) {
            io.stderr(error.message)
            return ExitCode.UsageError
        }
        throw error
    }
}

class UsageError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'UsageError'
    }
}

// ============================================================================
// Shared steps
// ============================================================================

async function loadInputs(files: string[], io: CliIo): Promise<Record<string, ToolLayers>> {
    if (files.length === 0) {
        throw new UsageError('No input files given')
    }

    const parsed: Array<Record<string, ToolLayers>> = []
    for (const path of files) {
        parsed.push(parseKeybindFile(await readInput(path, io), path))
    }
    log.debug('Loaded {count} input files', { count: files.length })
    return combineLayers(parsed)
}

async function readInput(path: string, io: CliIo): Promise<string> {
    try {
        return await io.readFile(path)
    } catch (error) {
        throw new ConfigFileError(path, error instanceof Error ? error.message : String(error))
    }
}

async function loadCommandSettings(values: ParsedValues, io: CliIo): Promise<SettingsValues> {
    const settings =
        values.settings === undefined
            ? getDefaultSettings()
            : parseSettingsFile(await readInput(values.settings, io), values.settings)

    await io.configureLogging?.(values.verbose === true || settings['logging.verbose'])
    return settings
}

// ============================================================================
// Commands
// ============================================================================

async function runValidate(files: string[], values: ParsedValues, io: CliIo): Promise<ExitCode> {
    const format = values.format ?? 'text'
    if (!isReportFormat(format)) {
        throw new UsageError(`Invalid format '${format}'. Must be text, json or junit`)
    }

    const settings = await loadCommandSettings(values, io)
    const layers = await loadInputs(files, io)
    const rules: ValidationRule[] =
        values.rules === undefined ? [] : parseRulesFile(await readInput(values.rules, io), values.rules)

    const batch = flattenLayers(layers).map(prepareKeybind)
    const result = validateConfiguration(batch, {
        rules,
        reservedKeyPolicy: settings['detection.reservedKeyPolicy'],
        allowSystemOverrides: settings['merge.allowSystemOverrides'],
        maxAlternatives: settings['suggestions.maxAlternatives'],
    })
    io.stdout(formatReport(result, format))

    if (!result.valid) return ExitCode.Failed
    const hasWarnings =
        result.warnings.length > 0 || result.violations.some((violation) => violation.severity === 'warning')
    return values.strict && hasWarnings ? ExitCode.Failed : ExitCode.Ok
}

async function runMerge(files: string[], values: ParsedValues, io: CliIo): Promise<ExitCode> {
    const settings = await loadCommandSettings(values, io)
    const layers = await loadInputs(files, io)
    const options = toMergeOptions(settings)
    if (values['no-resolve']) options.resolveConflicts = false

    const result = merge(layers, options)
    const text = JSON.stringify({ generatedAt: io.now().toISOString(), ...result }, null, 2)

    if (values.out === undefined) {
        io.stdout(text)
    } else {
        await io.writeFile(values.out, text)
        io.stdout(
            `Merged ${String(result.statistics.totalKeybinds)} keybinds from ${String(Object.keys(result.tools).length)} tools into ${values.out} (${String(result.statistics.enabled)} enabled, ${String(result.collisions.resolved.length)} conflicts resolved)`,
        )
    }

    return result.validation.valid ? ExitCode.Ok : ExitCode.Failed
}

async function runSuggest(files: string[], values: ParsedValues, io: CliIo): Promise<ExitCode> {
    const limit = values.limit === undefined ? DEFAULT_SUGGESTION_LIMIT : Number(values.limit)
    if (!Number.isInteger(limit) || limit < 1) {
        throw new UsageError(`Invalid limit '${String(values.limit)}'. Must be a positive whole number`)
    }

    const settings = await loadCommandSettings(values, io)
    const layers = await loadInputs(files, io)
    const result = merge(layers, { ...toMergeOptions(settings), generateSuggestions: true })

    const all = rankSuggestions([
        ...Object.values(result.tools).flatMap((tool) => tool.suggestions),
        ...result.validation.suggestions,
    ])
    const selected = all.filter((suggestion) => values.tool === undefined || suggestion.tool === values.tool)

    if (selected.length === 0) {
        io.stdout('No suggestions')
        return ExitCode.Ok
    }

    io.stdout(
        selected
            .slice(0, limit)
            .map((suggestion, index) => formatSuggestion(suggestion, index + 1))
            .join('\n'),
    )
    return ExitCode.Ok
}

export function formatSuggestion(suggestion: KeybindSuggestion, position: number): string {
    const keys =
        suggestion.currentKey !== undefined && suggestion.suggestedKey !== undefined
            ? ` (${suggestion.currentKey} -> ${suggestion.suggestedKey})`
            : ''
    return `${String(position)}. [${suggestion.kind}] ${suggestion.action}${keys}: ${suggestion.reason} (confidence ${suggestion.confidence.toFixed(2)})`
}

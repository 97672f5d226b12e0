/**
 * Errors for structurally invalid input.
 * Conflicts are never thrown; they are returned as data.
 */

import type { ZodError } from 'zod'

export class InvalidKeybindError extends Error {
    constructor(
        public keybindId: string,
        public reason: string,
    ) {
        super(`Invalid keybind '${keybindId}': ${reason}`)
        this.name = 'InvalidKeybindError'
    }
}

export class ConfigFileError extends Error {
    constructor(
        public path: string,
        public reason: string,
    ) {
        super(`Can't use '${path}': ${reason}`)
        this.name = 'ConfigFileError'
    }
}

/** One line per schema issue, prefixed with its path: 'rules.0.kind: Invalid discriminator value' */
export function formatSchemaIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')
}

/** JSON.parse that reports a syntax error as a ConfigFileError for the file */
export function parseConfigJson(text: string, path: string): unknown {
    try {
        return JSON.parse(text)
    } catch (error) {
        throw new ConfigFileError(path, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`)
    }
}

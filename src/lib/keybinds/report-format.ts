/**
 * Render a validation result for people (text), tools (json) or CI (JUnit XML).
 */

import type { Conflict, RuleViolation, ValidationResult } from './types'

export const reportFormats = ['text', 'json', 'junit'] as const
export type ReportFormat = (typeof reportFormats)[number]

export function isReportFormat(value: string): value is ReportFormat {
    return reportFormats.some((format) => format === value)
}

export function formatReport(result: ValidationResult, format: ReportFormat): string {
    switch (format) {
        case 'text':
            return formatText(result)
        case 'json':
            return JSON.stringify(result, null, 2)
        case 'junit':
            return formatJunit(result)
    }
}

// ============================================================================
// Text
// ============================================================================

function formatText(result: ValidationResult): string {
    const lines = [
        `Keybind validation ${result.valid ? 'passed' : 'failed'}`,
        `${String(result.errors.length)} errors, ${String(result.warnings.length)} warnings, ${String(result.info.length)} info, ${String(result.violations.length)} rule violations`,
    ]

    const entries: Array<Conflict | RuleViolation> = [
        ...result.errors,
        ...result.warnings,
        ...result.info,
        ...result.violations,
    ]
    if (entries.length > 0) lines.push('')
    for (const entry of entries) {
        const label = 'type' in entry ? entry.type : entry.rule
        lines.push(`${entry.severity.toUpperCase()} [${label}] ${entry.message}`)
        lines.push(`  keybinds: ${entry.keybinds.join(', ')}`)
        if (entry.suggestions.length > 0) {
            lines.push(`  try: ${entry.suggestions.join(', ')}`)
        }
    }

    if (result.suggestions.length > 0) {
        lines.push('', 'Suggestions:')
        for (const suggestion of result.suggestions) {
            lines.push(`  - ${suggestion.action}: ${suggestion.reason}`)
        }
    }

    return lines.join('\n')
}

// ============================================================================
// JUnit
// ============================================================================

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;')
}

/** Errors fail; warnings and info pass but are listed. Rule violations fail when their severity is error. */
function formatJunit(result: ValidationResult): string {
    const cases: string[] = []
    let failures = 0

    const addCase = (name: string, classname: string, failureMessage?: string): void => {
        if (failureMessage === undefined) {
            cases.push(`  <testcase name="${escapeXml(name)}" classname="${classname}"/>`)
            return
        }
        failures++
        cases.push(`  <testcase name="${escapeXml(name)}" classname="${classname}">`)
        cases.push(`    <failure message="${escapeXml(failureMessage)}"/>`)
        cases.push('  </testcase>')
    }

    for (const error of result.errors) addCase(error.id, 'validation.errors', error.message)
    for (const warning of result.warnings) addCase(warning.id, 'validation.warnings')
    for (const info of result.info) addCase(info.id, 'validation.info')
    for (const violation of result.violations) {
        addCase(
            violation.id,
            `validation.rules.${violation.rule}`,
            violation.severity === 'error' ? violation.message : undefined,
        )
    }

    return [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `<testsuite name="keybind-validation" tests="${String(countCases(result))}" failures="${String(failures)}" errors="0">`,
        ...cases,
        '</testsuite>',
    ].join('\n')
}

function countCases(result: ValidationResult): number {
    return result.errors.length + result.warnings.length + result.info.length + result.violations.length
}

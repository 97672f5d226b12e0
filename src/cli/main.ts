/**
 * keybinds CLI entry point.
 *
 * Run: npm run cli -- validate keybinds.json --format junit
 */

/* eslint-disable no-console */

import { readFile, writeFile } from 'node:fs/promises'
import { initLogger } from '$lib/logger'
import { runCli } from './commands'

const exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readFile: (path) => readFile(path, 'utf8'),
    writeFile: (path, text) => writeFile(path, `${text}\n`, 'utf8'),
    now: () => new Date(),
    configureLogging: (verbose) => initLogger({ verbose }),
})

process.exit(exitCode)

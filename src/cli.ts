/**
 * typed-collections CLI
 *
 * Query a JSON file of records from the command line.
 *
 * @example
 * ```bash
 * # Records whose age is at least 18
 * typed-collections where users.json age '>=' 18
 *
 * # Names ending in "son"
 * typed-collections like users.json name '%son'
 *
 * # One record per email
 * typed-collections unique users.json email
 *
 * # Read from stdin, require every record to be a plain object
 * cat users.json | typed-collections count - --type object
 * ```
 */

import { readFileSync } from 'node:fs'
import { Collection } from './collection'
import { createFilterPredicate, resolveOperator } from './filter'
import { isPlainObject } from './types'

export interface CliIO {
  log(message: string): void
  error(message: string): void
  /** Read a file, or stdin for `-` */
  readInput(path: string): string
  env: Record<string, string | undefined>
}

export const defaultIO: CliIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  readInput: (path) => readFileSync(path === '-' ? 0 : path, 'utf8'),
  env: process.env,
}

const USAGE = `
typed-collections - Query JSON records with typed collections

Usage:
  typed-collections <command> <file> [args] [options]

Commands:
  where <file> <column> <operator> <value>  Filter by a comparison (value is JSON, or a bare string)
  like <file> <column> <pattern>            Filter by a LIKE pattern (%abc, abc%, %abc%)
  unique <file> [column]                    Keep the first record of every distinct value
  count <file>                              Count the records
  keys <file>                               List the record keys

Use - as <file> to read from stdin.

Options:
  --type <type>    Expected record type (string, integer, float, boolean, array, object, ...)
  --strict         Case-sensitive, strict comparisons
  --help           Show this help message

Environment Variables:
  COLLECTION_TYPE    Expected record type
  COLLECTION_STRICT  Set to 1 for strict comparisons
`

const VALUE_FLAGS = new Set(['--type'])
const BOOLEAN_FLAGS = new Set(['--strict', '--help', '-h'])

function getArg(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag)
  if (index !== -1 && args[index + 1]) {
    return args[index + 1]
  }
  return undefined
}

function positionals(args: string[]): string[] {
  const result: string[] = []
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (VALUE_FLAGS.has(arg)) {
      i++
    } else if (!BOOLEAN_FLAGS.has(arg)) {
      result.push(arg)
    }
  }
  return result
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    // not JSON: use the bare string
    return raw
  }
}

function loadRecords(io: CliIO, file: string, type: string | undefined): Collection<unknown> {
  const data: unknown = JSON.parse(io.readInput(file))
  if (!Array.isArray(data) && !isPlainObject(data)) {
    throw new Error('Input must be a JSON array or object')
  }
  return new Collection<unknown>(data, { type })
}

/**
 * Run a CLI command and return the exit code
 */
export function run(args: string[], io: CliIO = defaultIO): number {
  const [command, file, ...rest] = positionals(args)

  if (!command || args.includes('--help') || args.includes('-h')) {
    io.log(USAGE)
    return 0
  }
  if (!file) {
    io.error(`Usage: typed-collections ${command} <file> ...`)
    return 1
  }

  const type = getArg(args, '--type') || io.env['COLLECTION_TYPE']
  const strict = args.includes('--strict') || io.env['COLLECTION_STRICT'] === '1'

  try {
    switch (command) {
      case 'where': {
        const [column, operator, value] = rest
        if (!column || !operator || value === undefined) {
          io.error('Usage: typed-collections where <file> <column> <operator> <value>')
          return 1
        }
        const predicate = createFilterPredicate<unknown>(column, resolveOperator(operator), parseValue(value), strict)
        const result = loadRecords(io, file, type).filter(predicate)
        io.log(JSON.stringify(result.toArray(), null, 2))
        return 0
      }

      case 'like': {
        const [column, pattern] = rest
        if (!column || pattern === undefined) {
          io.error('Usage: typed-collections like <file> <column> <pattern>')
          return 1
        }
        const result = loadRecords(io, file, type).whereLike(column, pattern, strict)
        io.log(JSON.stringify(result.toArray(), null, 2))
        return 0
      }

      case 'unique': {
        const [column] = rest
        const result = loadRecords(io, file, type).unique(column, strict)
        io.log(JSON.stringify(result.toArray(), null, 2))
        return 0
      }

      case 'count': {
        io.log(String(loadRecords(io, file, type).count()))
        return 0
      }

      case 'keys': {
        io.log(JSON.stringify(loadRecords(io, file, type).keys().toArray()))
        return 0
      }

      default:
        io.error(`Unknown command: ${command}`)
        io.error(USAGE)
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    io.error(`Error: ${message}`)
    return 1
  }
}

import { errorMessage } from '../errors'

export interface PositionalSpec {
  name: string
  required?: boolean
}

export interface OptionSpec {
  alias?: string
  /** Boolean flags take no value */
  type: 'boolean' | 'string'
  description: string
}

export interface CommandSpec {
  usage: string
  positionals?: PositionalSpec[]
  options?: Record<string, OptionSpec>
}

export interface ParsedArgs {
  positionals: Record<string, string | undefined>
  flags: Record<string, boolean>
  values: Record<string, string | undefined>
  help: boolean
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Parse `--flag`, `--opt value`, `--opt=value`, `-a value` and positionals.
 * `--help` / `-h` short-circuits validation.
 */
export function parseCommandArgs(argv: string[], spec: CommandSpec): ParsedArgs {
  const options = spec.options ?? {}
  const positionalSpecs = spec.positionals ?? []
  const byAlias = new Map<string, string>()
  for (const [name, option] of Object.entries(options)) {
    if (option.alias) byAlias.set(option.alias, name)
  }

  const result: ParsedArgs = { positionals: {}, flags: {}, values: {}, help: false }
  for (const [name, option] of Object.entries(options)) {
    if (option.type === 'boolean') result.flags[name] = false
  }
  const rest: string[] = []

  const end = argv.includes('--') ? argv.indexOf('--') : argv.length
  if (argv.slice(0, end).some((arg) => arg === '--help' || arg === '-h')) {
    result.help = true
    return result
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '--') {
      rest.push(...argv.slice(i + 1))
      break
    }

    let name: string | undefined
    let inlineValue: string | undefined
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
      inlineValue = eq === -1 ? undefined : arg.slice(eq + 1)
    } else if (arg.startsWith('-') && arg.length > 1) {
      name = byAlias.get(arg.slice(1))
      if (!name) throw new UsageError(`Unknown option: ${arg}`)
    } else {
      rest.push(arg)
      continue
    }

    const option = options[name]
    if (!option) throw new UsageError(`Unknown option: ${arg}`)

    if (option.type === 'boolean') {
      if (inlineValue !== undefined) throw new UsageError(`Option --${name} does not take a value`)
      result.flags[name] = true
      continue
    }

    const value = inlineValue ?? argv[i + 1]
    if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
      throw new UsageError(`Option --${name} requires a value`)
    }
    if (inlineValue === undefined) i++
    result.values[name] = value
  }

  if (rest.length > positionalSpecs.length) {
    throw new UsageError(`Unexpected argument: ${rest[positionalSpecs.length]}`)
  }
  positionalSpecs.forEach((positional, index) => {
    const value = rest[index]
    if (value === undefined && positional.required) {
      throw new UsageError(`Missing required argument: <${positional.name}>`)
    }
    result.positionals[positional.name] = value
  })

  return result
}

export function formatUsage(spec: CommandSpec): string {
  const lines = [`Usage: ${spec.usage}`]
  const entries = Object.entries(spec.options ?? {})
  if (entries.length > 0) {
    lines.push('', 'Options:')
    for (const [name, option] of entries) {
      const flag = [option.alias ? `-${option.alias}, ` : '', `--${name}`, option.type === 'string' ? ' <value>' : '']
        .join('')
      lines.push(`  ${flag.padEnd(26)}${option.description}`)
    }
  }
  lines.push(`  ${'-h, --help'.padEnd(26)}Show this message`)
  return lines.join('\n')
}

/**
 * Entry point wrapper: runs `main`, printing usage for argument errors and
 * `✗ Error: …` for anything else, with exit code 1.
 */
export function runCommand(spec: CommandSpec, main: (args: ParsedArgs) => Promise<void>): void {
  let args: ParsedArgs
  try {
    args = parseCommandArgs(process.argv.slice(2), spec)
  } catch (err) {
    console.error(`${errorMessage(err)}\n\n${formatUsage(spec)}`)
    process.exit(1)
  }
  if (args.help) {
    console.log(formatUsage(spec))
    return
  }

  main(args).catch((err: unknown) => {
    console.error(`\n✗ Error: ${errorMessage(err)}`)
    process.exit(1)
  })
}

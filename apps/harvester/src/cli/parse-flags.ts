export type FlagValue = string | boolean

export interface ParsedArgs {
  /** Tokens before the first flag, in order */
  positionals: string[]
  flags: Record<string, FlagValue>
}

/**
 * `--key value` pairs and bare `--switch` booleans. Tokens following a flag
 * up to the next flag are joined with spaces into that flag's value, so
 * unquoted multi-word values survive.
 */
export function parseFlags(argv: string[]): ParsedArgs {
  const positionals: string[] = []
  const flags: Record<string, FlagValue> = {}

  let i = 0
  while (i < argv.length && !argv[i].startsWith('--')) {
    positionals.push(argv[i])
    i++
  }

  for (; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return { positionals, flags }
}

export function asString(value: FlagValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function asSwitch(value: FlagValue | undefined): boolean | undefined {
  if (value === undefined) return undefined
  if (typeof value === 'boolean') return value
  return value.toLowerCase() !== 'false'
}

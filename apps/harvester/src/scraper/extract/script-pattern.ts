import type { CandidateStrategy } from '../types.js'

/**
 * Patterns for reaction strings embedded in inline scripts or markup text
 * that the attribute scan cannot see (e.g. strings built up in JS).
 * Each pattern captures the quoted payload in group 1.
 */
export const SCRIPT_PATTERNS: readonly RegExp[] = [
  /reactions\.push\(\s*['"]([^'"]+)['"]\s*\)/g,
  /reaction[Ss]miles\s*[=:]\s*['"]([^'"]+)['"]/g,
  /data-reaction-smiles\s*=\s*['"]([^'"]+)['"]/g,
  /smiles\s*:\s*['"]([^'"]+>>?[^'"]+)['"]/g,
]

export function matchScriptPatterns(
  rawText: string,
  patterns: readonly RegExp[] = SCRIPT_PATTERNS
): string[] {
  const matches: string[] = []
  for (const pattern of patterns) {
    for (const match of rawText.matchAll(pattern)) {
      const captured = match[1]?.trim()
      if (captured && captured.includes('>')) {
        matches.push(captured)
      }
    }
  }
  return matches
}

export const scriptPatternStrategy: CandidateStrategy = {
  method: 'script-pattern',
  extract(_$, rawText): string[] {
    return matchScriptPatterns(rawText)
  },
}

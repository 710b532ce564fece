import type { SplitReaction } from '../types.js'

const DOUBLE_ARROW = '>>'
const ARROW = '>'
const COMPONENT_SEPARATOR = '.'

/**
 * Split a field on the component separator, trimming each component and
 * dropping empty ones. Source order is kept.
 */
export function splitComponents(field: string): string[] {
  return field
    .split(COMPONENT_SEPARATOR)
    .map(component => component.trim())
    .filter(component => component.length > 0)
}

/**
 * Split `text` on the first `maxSplits` occurrences of `separator`.
 * Anything past the last split stays in the final field.
 */
function splitFirst(text: string, separator: string, maxSplits: number): string[] {
  const fields: string[] = []
  let rest = text
  for (let i = 0; i < maxSplits; i++) {
    const index = rest.indexOf(separator)
    if (index === -1) break
    fields.push(rest.slice(0, index))
    rest = rest.slice(index + separator.length)
  }
  fields.push(rest)
  return fields
}

/**
 * Split a reaction SMILES string into reactant, reagent and product lists.
 *
 * `A.B>>C` has no reagents; `A>B>C` has all three roles. Returns null when
 * the text has no arrow at all. This is a syntactic split only: nothing here
 * checks that the components are valid SMILES, and an empty product list is
 * returned as-is for the store to judge.
 */
export function splitReaction(raw: string): SplitReaction | null {
  if (raw.includes(DOUBLE_ARROW)) {
    const [reactants, products] = splitFirst(raw, DOUBLE_ARROW, 1)
    return {
      reactants: splitComponents(reactants),
      reagents: [],
      products: splitComponents(products ?? ''),
    }
  }

  if (raw.includes(ARROW)) {
    const [reactants, reagents, products] = splitFirst(raw, ARROW, 2)
    return {
      reactants: splitComponents(reactants),
      reagents: splitComponents(reagents ?? ''),
      products: splitComponents(products ?? ''),
    }
  }

  return null
}

/**
 * Rebuild a whitespace-free reaction string from split roles.
 * `A>B>C` form is always used, so `A>>C` comes back as `A>>C` too.
 */
export function joinReaction(split: SplitReaction): string {
  return [split.reactants, split.reagents, split.products]
    .map(role => role.join(COMPONENT_SEPARATOR))
    .join(ARROW)
}

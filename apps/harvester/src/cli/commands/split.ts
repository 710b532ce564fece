import { joinReaction, splitReaction } from '../../scraper/index.js'

interface SplitCommandArgs {
  reaction: string
}

export async function runSplitCommand(args: SplitCommandArgs): Promise<number> {
  if (!args.reaction) {
    console.error('Missing <reaction-smiles>')
    return 2
  }

  const split = splitReaction(args.reaction)
  if (!split) {
    console.error(`Not a reaction string (no '>' found): ${args.reaction}`)
    return 1
  }

  console.log(
    JSON.stringify(
      {
        reactants: split.reactants,
        reagents: split.reagents,
        products: split.products,
        canonical: joinReaction(split),
      },
      null,
      2
    )
  )
  return 0
}

export const SELECTORS = {
  // Elements that expose the reaction SMILES directly as an attribute.
  reactionAttr: 'data-reaction-smiles',
  // Every cell of every table; headers sometimes carry data on this site.
  tableCells: 'table tr td, table tr th',
  // Candidate pagination links.
  links: 'a[href]',
} as const

/**
 * Run-Level Reaction Store
 *
 * Holds every reaction record accepted during one run, keyed by the raw
 * reaction string. Insertion order is kept so exports are deterministic.
 * One store per run; nothing is ever removed.
 */

import type { ProductPolicy, ReactionRecord, ReactionSummary } from '../types.js'

export interface ReactionStoreOptions {
  /** Default: 'reject-empty-products' */
  productPolicy?: ProductPolicy
}

export type InsertOutcome = 'inserted' | 'duplicate' | 'rejected'

export class ReactionStore {
  private readonly records = new Map<string, ReactionRecord>()
  readonly productPolicy: ProductPolicy

  constructor(options: ReactionStoreOptions = {}) {
    this.productPolicy = options.productPolicy ?? 'reject-empty-products'
  }

  get size(): number {
    return this.records.size
  }

  has(reactionSmiles: string): boolean {
    return this.records.has(reactionSmiles)
  }

  /**
   * Insert a record. Returns false when the reaction string is already
   * stored or the record fails the product policy.
   */
  insert(record: ReactionRecord): boolean {
    return this.tryInsert(record) === 'inserted'
  }

  /**
   * Same as insert(), but says why a record was not stored.
   */
  tryInsert(record: ReactionRecord): InsertOutcome {
    if (!this.accepts(record)) {
      return 'rejected'
    }
    if (this.records.has(record.reactionSmiles)) {
      return 'duplicate'
    }
    this.records.set(record.reactionSmiles, record)
    return 'inserted'
  }

  exportAll(): ReactionRecord[] {
    return [...this.records.values()]
  }

  summary(): ReactionSummary {
    const reactants = new Set<string>()
    const products = new Set<string>()

    for (const record of this.records.values()) {
      record.reactantSmiles.forEach(component => reactants.add(component))
      record.productSmiles.forEach(component => products.add(component))
    }

    return {
      totalReactions: this.records.size,
      uniqueReactantComponents: reactants.size,
      uniqueProductComponents: products.size,
    }
  }

  private accepts(record: ReactionRecord): boolean {
    if (this.productPolicy === 'reject-empty-products') {
      return record.productSmiles.length > 0
    }
    return (
      record.reactantSmiles.length > 0 ||
      record.reagentSmiles.length > 0 ||
      record.productSmiles.length > 0
    )
  }
}

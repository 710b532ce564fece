/**
 * Run Export
 *
 * Serializes a finished run to the JSON export document and, optionally, a
 * flat CSV with one row per reaction. Field names are snake_case in both.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import { loggers } from '../config/logger.js'
import { HarvestError, ERROR_CODES } from '../lib/errors.js'
import type { ExtractionMethod, ReactionRecord } from '../scraper/types.js'

const log = loggers.writer

export interface ExportMetadata {
  doi: string
  total_reactions: number
  scraped_at: string
  source: string
}

export interface ExportedReaction {
  reaction_smiles: string
  reactant_smiles: string[]
  reagent_smiles: string[]
  product_smiles: string[]
  source_url: string
  scraped_at: string
  extraction_method?: ExtractionMethod
}

export interface ReactionExport {
  metadata: ExportMetadata
  reactions: ExportedReaction[]
}

export const CSV_COLUMNS = [
  'reaction_smiles',
  'reactant_smiles',
  'reagent_smiles',
  'product_smiles',
  'source_url',
  'scraped_at',
  'extraction_method',
] as const

export function toExportedReaction(record: ReactionRecord): ExportedReaction {
  return {
    reaction_smiles: record.reactionSmiles,
    reactant_smiles: [...record.reactantSmiles],
    reagent_smiles: [...record.reagentSmiles],
    product_smiles: [...record.productSmiles],
    source_url: record.sourceUrl,
    scraped_at: record.scrapedAt,
    ...(record.extractionMethod ? { extraction_method: record.extractionMethod } : {}),
  }
}

export function buildExport(
  run: { doi: string; source: string; records: readonly ReactionRecord[] },
  exportedAt: Date = new Date()
): ReactionExport {
  return {
    metadata: {
      doi: run.doi,
      total_reactions: run.records.length,
      scraped_at: exportedAt.toISOString(),
      source: run.source,
    },
    reactions: run.records.map(toExportedReaction),
  }
}

export function serializeJson(document: ReactionExport): string {
  return JSON.stringify(document, null, 2)
}

/**
 * One row per reaction. Component lists are joined with `.`, which is the
 * separator they were split on, so each cell is a valid SMILES fragment list.
 */
export function serializeCsv(records: readonly ReactionRecord[]): string {
  const rows = records.map(record => ({
    reaction_smiles: record.reactionSmiles,
    reactant_smiles: record.reactantSmiles.join('.'),
    reagent_smiles: record.reagentSmiles.join('.'),
    product_smiles: record.productSmiles.join('.'),
    source_url: record.sourceUrl,
    scraped_at: record.scrapedAt,
    extraction_method: record.extractionMethod ?? '',
  }))
  return stringify(rows, { header: true, columns: [...CSV_COLUMNS] })
}

async function writeTextFile(filePath: string, contents: string, kind: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, contents, 'utf8')
  } catch (error) {
    throw new HarvestError(
      ERROR_CODES.EXPORT_FAILED,
      `Failed to write ${kind} export to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    )
  }
  log.info('Export written', { kind, path: filePath, bytes: Buffer.byteLength(contents, 'utf8') })
}

export async function writeJsonExport(filePath: string, document: ReactionExport): Promise<void> {
  await writeTextFile(filePath, serializeJson(document), 'json')
}

export async function writeCsvExport(filePath: string, records: readonly ReactionRecord[]): Promise<void> {
  await writeTextFile(filePath, serializeCsv(records), 'csv')
}

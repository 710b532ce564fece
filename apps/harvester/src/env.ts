/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local in development. Production runs take their
 * settings from the process environment only.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '.env.local')
  config({ path: envPath })
}

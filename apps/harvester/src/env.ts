/**
 * Environment loader - import first, before anything reads process.env.
 *
 * Loads apps/harvester/.env.local outside production. Production injects
 * variables directly and never reads the file.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}

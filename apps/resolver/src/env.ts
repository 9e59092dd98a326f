/**
 * Environment loader - import first, before any other module.
 *
 * Loads apps/resolver/.env.local outside production; production hosts
 * inject variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const appRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..')
  config({ path: resolve(appRoot, '.env.local') })
}

/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/discovery/.env.local in development. Production injects
 * environment variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}

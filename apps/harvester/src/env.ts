/**
 * Environment loader - import before anything that reads settings.
 *
 * Loads apps/harvester/.env.local outside production; production runs get
 * their variables from the host.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = fileURLToPath(new URL('../.env.local', import.meta.url))
  config({ path: envPath })
}

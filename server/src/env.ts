/**
 * Load env before anything reads process.env (logger, Sentry, download config).
 * Must be the first import in index.ts.
 */
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

dotenv.config()

// Project root .env when the server is started from server/ (cwd) or from dist/ (__dirname)
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv) {
  dotenv.config({ path: rootEnv, override: false })
}

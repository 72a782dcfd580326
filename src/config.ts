import dotenv from 'dotenv'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { DEFAULT_LAS_CHARSET, DEFAULT_SEGY_CHARSET } from './lib/parsers/types'

let envLoaded = false

// Single dotenv load per process: project-root .env when present, otherwise
// dotenv's default lookup from the working directory.
function loadEnvFile(): void {
  if (envLoaded) return
  envLoaded = true
  const here = path.dirname(fileURLToPath(import.meta.url))
  const rootEnv = path.resolve(here, '../.env')
  if (fs.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv })
    return
  }
  dotenv.config()
}

export interface Config {
  SEGY_CHARSET: string
  LAS_CHARSET: string
  SEGY_TRACE_SUMMARY: boolean
  VERBOSE: boolean
}

function flag(raw: string | undefined): boolean {
  const v = (raw ?? '').trim().toLowerCase()
  return v === '1' || v === 'true' || v === 'yes' || v === 'on'
}

/**
 * Reads settings from `env`. Without an explicit `env` the .env file is
 * loaded into `process.env` first, once per process.
 */
export function getConfig(env?: NodeJS.ProcessEnv): Config {
  if (!env) loadEnvFile()
  const vars = env ?? process.env
  return {
    SEGY_CHARSET: vars.SEGY_CHARSET?.trim() || DEFAULT_SEGY_CHARSET,
    LAS_CHARSET: vars.LAS_CHARSET?.trim() || DEFAULT_LAS_CHARSET,
    // Off by default: indexing only needs the headers
    SEGY_TRACE_SUMMARY: flag(vars.SEGY_TRACE_SUMMARY),
    VERBOSE: flag(vars.VERBOSE),
  }
}

export * from './lib/decoder'
export * from './lib/parsers'
export { getConfig } from './config'
export type { Config } from './config'

import { readFileSync, existsSync } from 'fs'
import { parseConfig, DEFAULT_CONFIG, type Config } from '../../src/lib/config'

let loadedConfig: Config = structuredClone(DEFAULT_CONFIG)

export async function loadConfig(configPath: string): Promise<void> {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }

  const content = readFileSync(configPath, 'utf-8')
  loadedConfig = parseConfig(content)
}

export function getConfig(): Config {
  return loadedConfig
}

export function resetConfig(): void {
  loadedConfig = structuredClone(DEFAULT_CONFIG)
}

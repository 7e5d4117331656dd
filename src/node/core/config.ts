import fs from 'fs'
import { z, ZodError } from 'zod'
import { ConfigError } from '../shared/errors'

export type Configuration = {
  /** Path the configuration was read from */
  configPath: string
  /** Directories to report on, in file order */
  directories: string[]
}

/**
 * Only the shape is checked. Unknown keys pass through untouched and paths are
 * taken verbatim.
 */
const ConfigFileSchema = z
  .object({
    directories: z.array(z.string()).optional()
  })
  .passthrough()

export async function loadConfiguration(configPath: string): Promise<Configuration> {
  let raw: string
  try {
    raw = await fs.promises.readFile(configPath, 'utf-8')
  } catch (error) {
    throw new ConfigError(`cannot read ${configPath}: ${describe(error)}`, configPath, error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${describe(error)}`, configPath, error)
  }

  try {
    const config = ConfigFileSchema.parse(parsed)
    return { configPath, directories: config.directories ?? [] }
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map((e) => `${e.path.join('.') || '(root)'} ${e.message}`)
      throw new ConfigError(`${configPath} is malformed: ${issues.join('; ')}`, configPath, error)
    }
    throw error
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

import { z, ZodError } from 'zod'
import { NetcheckConfig, NetcheckConfigSchema } from '../types/config'
import { Target, TargetSchema } from '../types/target'
import { ConfigurationError } from '../errors'

const TargetListSchema = z.array(TargetSchema)

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  try {
    return schema.parse(input)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(message, error.issues)
    }
    throw error
  }
}

/**
 * Validates a configuration object against the schema
 * @throws ConfigurationError if validation fails
 */
export default function validateConfig(config: unknown): NetcheckConfig {
  return parseOrThrow(NetcheckConfigSchema, config, 'Configuration validation failed')
}

/**
 * Turns raw target descriptors into the normalized target model.
 * An empty list is valid and yields no targets.
 * @throws ConfigurationError on the first malformed or ambiguous descriptor set
 */
export function parseTargets(descriptors: readonly unknown[]): Target[] {
  return parseOrThrow(TargetListSchema, descriptors, 'Target validation failed')
}

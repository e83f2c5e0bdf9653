import { z } from 'zod'
import { TargetSchema } from './target'

export const NetcheckConfigSchema = z.object({
  targets: z.array(TargetSchema).min(1, 'At least one target is required'),
})

export type NetcheckConfig = z.output<typeof NetcheckConfigSchema>

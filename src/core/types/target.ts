import { z } from 'zod'
import { parseTcpAddress, validateHttpAddress } from '../utils/address'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)]),
)

// Request body of a custom HTTP check: exactly one representation, never both
export type HttpBody =
  | { type: 'form'; params: Record<string, string> }
  | { type: 'json'; json: JsonValue }

export interface CustomHttpRequest {
  body: HttpBody
  expectedStatus: number
}

export const CustomHttpRequestSchema = z
  .object({
      params: z.record(z.string(), z.string()).optional(),
      json: JsonValueSchema.optional(),
      expectedStatus: z.number().int().min(100).max(599),
  })
  .strict()
  .superRefine((custom, ctx) => {
    const hasParams = custom.params !== undefined
    const hasJson = custom.json !== undefined

    if (hasParams && hasJson) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'custom request must set exactly one of "params" or "json", not both',
      })
    } else if (!hasParams && !hasJson) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'custom request must set exactly one of "params" or "json"',
      })
    }
  })
  .transform((custom): CustomHttpRequest => {
    const body: HttpBody =
      custom.params !== undefined ? { type: 'form', params: custom.params } : { type: 'json', json: custom.json ?? null }
    return { body, expectedStatus: custom.expectedStatus }
  })

const DescriptionSchema = z.string().trim().min(1, 'Target description is required')

export const TcpTargetSchema = z
  .object({
    kind: z.literal('tcp'),
    description: DescriptionSchema,
    address: z
      .string()
      .trim()
      .refine((address) => parseTcpAddress(address) !== null, {
        message: 'address must be in host:port format (IPv6: [addr]:port)',
      }),
  })
  .strict()

export const HttpTargetSchema = z
  .object({
    kind: z.literal('http'),
    description: DescriptionSchema,
    address: z
      .string()
      .trim()
      .superRefine((address, ctx) => {
        const problem = validateHttpAddress(address)
        if (problem) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem })
        }
      }),
    custom: CustomHttpRequestSchema.optional(),
  })
  .strict()

export const TargetDescriptorSchema = z.discriminatedUnion('kind', [TcpTargetSchema, HttpTargetSchema])

// Config files may spell the kind as "Tcp" / "HTTP"
function normalizeKind(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && 'kind' in value) {
    const { kind } = value
    if (typeof kind === 'string') {
      return { ...value, kind: kind.toLowerCase() }
    }
  }
  return value
}

export const TargetSchema = z.preprocess(normalizeKind, TargetDescriptorSchema)

export type TcpTarget = z.output<typeof TcpTargetSchema>
export type HttpTarget = z.output<typeof HttpTargetSchema>
export type Target = TcpTarget | HttpTarget
export type TargetKind = Target['kind']

// What a config file (or a library caller) hands over before validation
export type TargetDescriptor = z.input<typeof TargetDescriptorSchema>

const ENV_REFERENCE = /\$\{([^}]+)\}/g

/**
 * Resolves environment variable references in strings
 * Supports ${VAR_NAME} syntax
 */
export function resolveEnvVars(value: string): string {
  return value.replace(ENV_REFERENCE, (_, varName: string) => {
    const envValue = process.env[varName]

    if (envValue === undefined) {
      throw new Error(`Environment variable "${varName}" is not defined`)
    }

    return envValue
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function resolveJsonLeaves(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(resolveJsonLeaves)
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, resolveJsonLeaves(entry)]))
  }
  return value
}

function resolveCustom(custom: unknown): unknown {
  if (!isRecord(custom)) {
    return custom
  }

  const resolved: Record<string, unknown> = { ...custom }
  const { params } = custom
  if (isRecord(params)) {
    resolved.params = Object.fromEntries(
      Object.entries(params).map(([key, value]) => [key, typeof value === 'string' ? resolveEnvVars(value) : value]),
    )
  }
  if ('json' in custom) {
    resolved.json = resolveJsonLeaves(custom.json)
  }
  return resolved
}

/**
 * Resolves ${VAR} references in a raw target descriptor: the address, form param
 * values and JSON string leaves. Keys and descriptions are left untouched.
 * Runs before validation, so the substituted values are what gets checked.
 */
export function resolveDescriptorEnv(descriptor: unknown): unknown {
  if (!isRecord(descriptor)) {
    return descriptor
  }

  const resolved: Record<string, unknown> = { ...descriptor }
  if (typeof descriptor.address === 'string') {
    resolved.address = resolveEnvVars(descriptor.address)
  }
  if ('custom' in descriptor) {
    resolved.custom = resolveCustom(descriptor.custom)
  }
  return resolved
}

export function resolveConfigEnv(document: unknown): unknown {
  if (!isRecord(document) || !Array.isArray(document.targets)) {
    return document
  }
  return { ...document, targets: document.targets.map(resolveDescriptorEnv) }
}

import { parse } from 'smol-toml'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Short key -> descriptor key; the long form wins when both are present
function renameKeys(value: Record<string, unknown>, aliases: Record<string, string>): Record<string, unknown> {
  const renamed: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    const target = aliases[key]
    if (target !== undefined && !(target in value)) {
      renamed[target] = entry
    } else {
      renamed[key] = entry
    }
  }
  return renamed
}

function normalizeTarget(entry: unknown): unknown {
  if (!isRecord(entry)) {
    return entry
  }

  const target = renameKeys(entry, { desc: 'description', addr: 'address' })
  if (isRecord(target.custom)) {
    target.custom = renameKeys(target.custom, { ok: 'expectedStatus' })
  }
  return target
}

/**
 * Parses a TOML config. Targets are `[[target]]` (or `[[targets]]`) tables;
 * `desc`, `addr` and `custom.ok` are accepted for `description`, `address`
 * and `custom.expectedStatus`.
 *
 * ```toml
 * [[target]]
 * kind = "Http"
 * desc = "Login form"
 * addr = "https://example.com/login"
 * custom = { params = { user = "probe" }, ok = 400 }
 * ```
 */
export function parseTomlConfig(content: string): unknown {
  const document: Record<string, unknown> = { ...parse(content) }

  if (!('targets' in document) && 'target' in document) {
    document.targets = document.target
    delete document.target
  }

  if (Array.isArray(document.targets)) {
    document.targets = document.targets.map(normalizeTarget)
  }

  return document
}

export type Env = Record<string, string | undefined>

/**
 * Read a variable, treating unset and blank values as missing
 */
export function readEnv(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim()
  return value ? value : fallback
}

/**
 * Read an optional variable; blank values count as unset
 */
export function readOptionalEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value || undefined
}

/**
 * Parse an integer variable and check it against a lower bound
 */
export function parseIntegerEnv(
  name: string,
  value: string,
  minimum: number
): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(
      `Invalid ${name}: ${value}. Expected a whole number >= ${minimum}`
    )
  }

  const parsed = parseInt(value, 10)
  if (parsed < minimum) {
    throw new Error(
      `Invalid ${name}: ${value}. Expected a whole number >= ${minimum}`
    )
  }
  return parsed
}

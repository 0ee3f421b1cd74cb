/**
 * Reads the optional `[hours]` argument. Returns `null` for anything that is
 * not a positive, finite number.
 */
export function parseHours(arg: string | undefined, fallback: number): number | null {
  if (arg === undefined) return fallback

  const hours = Number(arg)
  return Number.isFinite(hours) && hours > 0 ? hours : null
}

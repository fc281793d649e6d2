/**
 * The `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if any.
 */
export function systemErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined

  return typeof err.code === "string" ? err.code : undefined
}

export function hasSystemErrorCode(err: unknown, ...codes: string[]): boolean {
  const code = systemErrorCode(err)

  return code !== undefined && codes.includes(code)
}

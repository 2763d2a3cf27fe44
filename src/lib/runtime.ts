export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}

const DEPENDENCY_ERROR_PATTERNS = [
  'database_url',
  'connection terminated',
  'connection refused',
  'econnrefused',
  'enotfound',
  'etimedout',
  'fetch failed',
  'websocket',
]

export function isDependencyError(error: unknown): boolean {
  const message = toErrorMessage(error).toLowerCase()
  return DEPENDENCY_ERROR_PATTERNS.some(pattern => message.includes(pattern))
}

export function describeFailure(error: unknown, dependency: string) {
  return {
    error: isDependencyError(error)
      ? `${dependency} dependency is unavailable`
      : `${dependency} call failed`,
    dependency,
    details: toErrorMessage(error),
  }
}

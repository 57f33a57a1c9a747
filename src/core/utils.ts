export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  // Below 59.95s, so that one decimal never reads "60.0s"
  if (ms < 59_950) {
    return `${(ms / 1000).toFixed(1)}s`
  }

  const totalSeconds = Math.round(ms / 1000)
  const minutes = Math.floor(totalSeconds / 60)
  return `${minutes}m ${totalSeconds % 60}s`
}

/** Shortens a content id such as `sha256:4f1c...` to its first 12 hex digits. */
export function shortId(id: string): string {
  return id.replace(/^sha256:/, '').slice(0, 12)
}

export const isDebugEnabled = (): boolean => process.env.PANEWALK_DEBUG === "1"

/** One JSON line on stderr per call, only when PANEWALK_DEBUG=1. */
export const debugLog = (payload: Record<string, unknown>): void => {
  if (isDebugEnabled()) {
    console.error(JSON.stringify(payload))
  }
}

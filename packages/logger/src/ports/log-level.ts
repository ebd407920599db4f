export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

export function isLogLevelName(value: string): value is LogLevelName {
  return (logLevelNames as readonly string[]).includes(value)
}

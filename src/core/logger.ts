const PREFIX = '[metrics-aggregator]'

export type TLogger = {
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export const logger: TLogger = {
  info(message: string, ...args: unknown[]): void {
    console.info(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(PREFIX, message, ...args)
  },
}

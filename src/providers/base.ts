import type { PlaceProvider, SearchRequest, ProviderResult, ProviderConfig } from './types.js'

export type LogLevel = 'info' | 'warn' | 'error'

/**
 * Abstract base class for all place providers
 * Provides common functionality and enforces the provider interface
 */
export abstract class BaseProvider implements PlaceProvider {
  public readonly name: string
  public readonly timeout: number
  protected readonly config: ProviderConfig

  constructor(config: ProviderConfig) {
    this.config = config
    this.name = config.name
    this.timeout = config.timeout
  }

  /**
   * Search for places around the request origin
   * Must be implemented by concrete providers
   */
  abstract search(request: SearchRequest): Promise<ProviderResult>

  /**
   * Helper to measure execution time
   */
  protected async measureTime<T>(fn: () => Promise<T>): Promise<{ result: T; latency: number }> {
    const start = performance.now()
    const result = await fn()
    const latency = Math.round(performance.now() - start)
    return { result, latency }
  }

  /**
   * Log provider activity
   */
  protected log(level: LogLevel, message: string, meta?: unknown) {
    const timestamp = new Date().toISOString()
    const line = `[${timestamp}] [${this.name}] [${level.toUpperCase()}] ${message}`
    if (level === 'error') {
      console.error(line, meta ?? '')
    } else if (level === 'warn') {
      console.warn(line, meta ?? '')
    } else {
      console.log(line, meta ?? '')
    }
  }
}

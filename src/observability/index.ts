import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability - structured logging and metrics
 *
 * - Structured JSON logging via Pino
 * - Child loggers per component
 * - Basic metrics (counters, gauges, timings)
 */

export interface LoggingOptions {
  pretty?: boolean
  level?: string
}

/**
 * Metrics interface - simple counters and gauges
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  gauge(name: string, value: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

/**
 * In-memory metrics, inspectable from tests
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.gauges.set(key, value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(`${name}.ms`, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Record<string, string>): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

function createLogger(options?: LoggingOptions): Logger {
  return pino({
    level: options?.level || 'info',
    ...(options?.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability

  public logger: Logger
  public readonly metrics: InMemoryMetrics

  private constructor(options?: LoggingOptions) {
    this.logger = createLogger(options)
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: LoggingOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  /**
   * Replace the root logger. Child loggers created earlier keep the old settings.
   */
  configure(options: LoggingOptions): void {
    this.logger = createLogger(options)
  }

  /**
   * Create a child logger bound to component context
   */
  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }

  /**
   * Measure duration of an async operation
   */
  async measureAsync<T>(
    name: string,
    operation: () => Promise<T>,
    labels?: Record<string, string>
  ): Promise<T> {
    const start = Date.now()
    try {
      const result = await operation()
      this.metrics.timing(name, Date.now() - start, labels)
      this.metrics.increment(name, 1, labels)
      return result
    } catch (error) {
      const errorLabels = { ...labels, status: 'error' }
      this.metrics.timing(name, Date.now() - start, errorLabels)
      this.metrics.increment(name, 1, errorLabels)
      throw error
    }
  }
}

export const obs = Observability.getInstance({ level: process.env.LOG_LEVEL })
export const metrics = obs.metrics

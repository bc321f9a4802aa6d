/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

/**
 * @file periodic-task.ts
 * @description
 * Cancellable, awaitable handle for a unit of work repeated on a fixed
 * interval (poll cycle, flush check, overflow replay, push, reaper).
 *
 * @remarks
 * - Scheduling is a `setTimeout` chain, so a slow run delays the next one
 *   instead of overlapping it.
 * - A run that throws is logged and counted; the task keeps going.
 * - `stop()` cancels the pending timer and resolves once the run in
 *   flight (if any) has finished.
 * - Every `start()` opens a new generation. A run left over from an
 *   earlier generation never reschedules, and a new run waits for it.
 */

export interface PeriodicTaskOptions {
  name: string
  intervalMs: number
  run: () => Promise<void>
  logger: Logger
  /** Fire the first run right after `start()` instead of one interval later. */
  runImmediately?: boolean
}

export type PeriodicTaskStats = {
  name: string
  running: boolean
  runs: number
  failures: number
  lastRunAt?: string
}

export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null
  private running = false
  private generation = 0
  private runs = 0
  private failures = 0
  private lastRunAt?: Date

  constructor(private readonly options: PeriodicTaskOptions) {
    if (options.intervalMs <= 0) {
      throw new RangeError(`[${options.name}] intervalMs must be > 0`)
    }
  }

  get isRunning(): boolean {
    return this.running
  }

  start(): void {
    if (this.running) return
    this.running = true
    this.generation++
    this.schedule(this.generation, this.options.runImmediately ? 0 : this.options.intervalMs)
    this.options.logger.debug({ task: this.options.name, intervalMs: this.options.intervalMs }, 'task started')
  }

  async stop(): Promise<void> {
    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    if (this.inFlight) await this.inFlight
    this.options.logger.debug({ task: this.options.name, runs: this.runs }, 'task stopped')
  }

  getStats(): PeriodicTaskStats {
    return {
      name: this.options.name,
      running: this.running,
      runs: this.runs,
      failures: this.failures,
      lastRunAt: this.lastRunAt?.toISOString(),
    }
  }

  private schedule(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null
      const previous = this.inFlight
      const current: Promise<void> = (previous ? previous.then(() => this.execute()) : this.execute()).finally(() => {
        if (this.inFlight === current) this.inFlight = null
        if (this.running && generation === this.generation) this.schedule(generation, this.options.intervalMs)
      })
      this.inFlight = current
    }, delayMs)
  }

  private async execute(): Promise<void> {
    try {
      await this.options.run()
    } catch (err) {
      this.failures++
      this.options.logger.error({ task: this.options.name, err }, 'task run failed')
    } finally {
      this.runs++
      this.lastRunAt = new Date()
    }
  }
}

import * as core from '@actions/core'
import type { Report } from '@ingress-observer/shared/report'
import { sleep as defaultSleep } from '@ingress-observer/shared/time-utils'
import type { ReportBuilder } from './report-builder.js'
import type { ReportSender } from './report-delivery.js'
import type { ResourceIndex } from './resource-index.js'

// Triggers closer than (interval - tolerance) to the last report are dropped
const DEFAULT_DEDUP_TOLERANCE_MS = 1000

export type ReporterPhase = 'waiting' | 'building'

type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>

export interface ReporterOptions {
  index: Pick<ResourceIndex, 'snapshotAll'>
  builder: Pick<ReportBuilder, 'build'>
  sender: ReportSender
  intervalMs: number
  dedupToleranceMs?: number
  /** Monotonic clock in milliseconds */
  now?: () => number
  sleep?: Sleep
}

/**
 * Builds a report from the index once per interval and hands it to the
 * sender. Deliveries are not awaited by the scheduling loop.
 */
export class Reporter {
  private readonly index: Pick<ResourceIndex, 'snapshotAll'>
  private readonly builder: Pick<ReportBuilder, 'build'>
  private readonly sender: ReportSender
  private readonly intervalMs: number
  private readonly dedupToleranceMs: number
  private readonly now: () => number
  private readonly sleep: Sleep

  private readonly deliveries = new Set<Promise<boolean>>()
  private currentPhase: ReporterPhase = 'waiting'
  private lastReportAt?: number

  constructor(options: ReporterOptions) {
    this.index = options.index
    this.builder = options.builder
    this.sender = options.sender
    this.intervalMs = options.intervalMs
    this.dedupToleranceMs =
      options.dedupToleranceMs ?? DEFAULT_DEDUP_TOLERANCE_MS
    this.now = options.now ?? (() => performance.now())
    this.sleep = options.sleep ?? defaultSleep
  }

  get phase(): ReporterPhase {
    return this.currentPhase
  }

  get pendingDeliveries(): number {
    return this.deliveries.size
  }

  /**
   * Run report cycles until `signal` aborts. The first cycle starts after
   * one full interval; aborting interrupts the wait, not a running build.
   */
  async run(signal: AbortSignal): Promise<void> {
    core.info(`Reporting every ${this.intervalMs / 1000}s`)

    while (await this.sleep(this.intervalMs, signal)) {
      try {
        await this.trigger('timer')
      } catch (error) {
        core.error(
          `Report cycle failed: ${error instanceof Error ? error.message : String(error)}`
        )
      }
    }

    core.info('Periodic reporting stopped')
  }

  /**
   * Build and dispatch one report unless a build is running or the last
   * report is less than one interval old.
   * @returns whether a report was dispatched
   */
  async trigger(source: string): Promise<boolean> {
    if (this.currentPhase === 'building') {
      core.debug(
        `Skipping report (${source}): a report is already being built`
      )
      return false
    }

    const startedAt = this.now()
    if (this.lastReportAt !== undefined) {
      const elapsed = startedAt - this.lastReportAt
      if (elapsed < this.intervalMs - this.dedupToleranceMs) {
        core.debug(
          `Skipping report (${source}): too soon since last report (${(elapsed / 1000).toFixed(1)}s ago)`
        )
        return false
      }
    }

    this.currentPhase = 'building'
    let report: Report
    try {
      core.info(`Building periodic report (${source})...`)
      report = await this.builder.build(this.index.snapshotAll())
    } finally {
      this.currentPhase = 'waiting'
    }

    this.lastReportAt = startedAt
    core.info(`Report contains ${report.ingresses.length} ingress entries`)
    this.dispatch(report)
    return true
  }

  /**
   * Wait for deliveries still in flight
   */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.deliveries))
  }

  private dispatch(report: Report): void {
    const delivery = this.sender.send(report).catch((error: unknown) => {
      core.error(
        `Failed to send report: ${error instanceof Error ? error.message : String(error)}`
      )
      return false
    })

    this.deliveries.add(delivery)
    void delivery.finally(() => this.deliveries.delete(delivery))
  }
}

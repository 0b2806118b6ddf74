import type { Report, StoredReport } from '@ingress-observer/shared/report'

/**
 * Fixed-capacity history of received reports; the oldest is evicted first
 */
export class ReportStore {
  private readonly buffer: Array<StoredReport | undefined>
  private next = 0
  private count = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid report store capacity: ${capacity}`)
    }
    this.buffer = new Array<StoredReport | undefined>(capacity).fill(undefined)
  }

  get size(): number {
    return this.count
  }

  add(report: Report, receivedAt: Date = new Date()): StoredReport {
    const stored: StoredReport = {
      timestamp: receivedAt.toISOString(),
      report
    }
    this.buffer[this.next] = stored
    this.next = (this.next + 1) % this.capacity
    this.count = Math.min(this.count + 1, this.capacity)
    return stored
  }

  /**
   * Stored reports, oldest first
   */
  list(): StoredReport[] {
    const start = (this.next - this.count + this.capacity) % this.capacity
    const reports: StoredReport[] = []
    for (let i = 0; i < this.count; i++) {
      const stored = this.buffer[(start + i) % this.capacity]
      if (stored) {
        reports.push(stored)
      }
    }
    return reports
  }
}

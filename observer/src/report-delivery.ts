import * as core from '@actions/core'
import {
  serializeReport,
  type Report
} from '@ingress-observer/shared/report'

export interface ReportSender {
  send(report: Report): Promise<boolean>
}

/**
 * POSTs reports to the receiver. Failures are logged and reported as
 * false; the next report cycle is the retry.
 */
export class ReportDelivery implements ReportSender {
  private readonly endpoint: string
  private readonly timeoutMs: number

  constructor(endpoint: string, timeoutMs: number) {
    this.endpoint = endpoint
    this.timeoutMs = timeoutMs
  }

  async send(report: Report): Promise<boolean> {
    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json'
        },
        body: serializeReport(report),
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      // The receiver's answer is not used; release the connection
      await response.body?.cancel()

      if (!response.ok) {
        core.error(
          `Failed to send report: ${response.status} ${response.statusText}`
        )
        return false
      }

      core.info(
        `Report sent successfully: ${report.ingresses.length} ingresses`
      )
      return true
    } catch (error) {
      core.error(
        `Failed to send report: ${error instanceof Error ? error.message : String(error)}`
      )
      return false
    }
  }
}

import * as core from '@actions/core'
import { loadReceiverConfig } from './config.js'
import { ReportStore } from './report-store.js'
import { createReceiverServer } from './server.js'

export async function run(): Promise<void> {
  try {
    const config = loadReceiverConfig()
    const store = new ReportStore(config.maxReports)
    const server = createReceiverServer(store)

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(config.port, () => {
        server.off('error', reject)
        resolve()
      })
    })

    const address = server.address()
    const port =
      typeof address === 'object' && address ? address.port : config.port
    core.info(`✅ Report receiver listening on port ${port}`)
    core.info(`Keeping the last ${config.maxReports} reports`)

    await new Promise<void>((resolve, reject) => {
      const shutdown = (signal: NodeJS.Signals) => {
        core.info(`Received ${signal}, shutting down`)
        server.close((error) => (error ? reject(error) : resolve()))
      }
      process.once('SIGTERM', shutdown)
      process.once('SIGINT', shutdown)
    })

    core.info('✅ Report receiver stopped')
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred'
    core.setFailed(errorMessage)
  }
}

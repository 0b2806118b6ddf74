import { z } from 'zod'

/**
 * Summary of the TLS secret referenced by an Ingress
 */
export const certificateDescriptorSchema = z.object({
  name: z.string().min(1),
  expires: z.string().datetime()
})

/**
 * One (ingress, host) pair
 */
export const reportEntrySchema = z.object({
  namespace: z.string(),
  name: z.string(),
  host: z.string().min(1),
  certificate: certificateDescriptorSchema.optional()
})

export const reportSchema = z.object({
  cluster: z.string(),
  ingresses: z.array(reportEntrySchema)
})

/**
 * A report as kept by the receiver, stamped with its arrival time
 */
export const storedReportSchema = z.object({
  timestamp: z.string().datetime(),
  report: reportSchema
})

export type CertificateDescriptor = z.infer<typeof certificateDescriptorSchema>
export type ReportEntry = z.infer<typeof reportEntrySchema>
export type Report = z.infer<typeof reportSchema>
export type StoredReport = z.infer<typeof storedReportSchema>

export class ReportValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid report: ${issues.join('; ')}`)
    this.name = 'ReportValidationError'
    this.issues = issues
  }
}

export function serializeReport(report: Report): string {
  return JSON.stringify(report)
}

/**
 * Validate an already decoded JSON value as a Report
 */
export function validateReport(value: unknown): Report {
  const result = reportSchema.safeParse(value)
  if (!result.success) {
    throw new ReportValidationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
    )
  }
  return result.data
}

/**
 * Decode and validate a serialized Report
 */
export function parseReport(json: string): Report {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch (error) {
    throw new ReportValidationError([
      `body is not valid JSON (${error instanceof Error ? error.message : String(error)})`
    ])
  }
  return validateReport(value)
}

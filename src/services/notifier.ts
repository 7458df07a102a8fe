import nodemailer, { type SendMailOptions } from "nodemailer"
import type pino from "pino"
import type { SmtpSettings } from "../config"
import { NotificationError, errorMessage } from "../errors"
import { withTimeout } from "../lib/retry"
import type { AlertBatch, Finding } from "../types"

export interface NotificationSink {
  readonly name: string
  /** Rejects with NotificationError. */
  send(batch: AlertBatch): Promise<void>
}

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>
}

export interface AlertMessage {
  subject: string
  text: string
}

function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString()
}

function formatFinding(finding: Finding): string {
  return [
    `- Time: ${formatTimestamp(finding.timestamp)}`,
    `  Client: ${finding.clientIdentifier}`,
    `  Domain: ${finding.domain}`,
    `  Source: ${finding.source}`,
    `  Reason: ${finding.reason}`,
  ].join("\n")
}

export function formatAlert(batch: AlertBatch): AlertMessage {
  const categories = batch.groups.map((group) => group.category).join(", ")
  const noun = batch.findings.length === 1 ? "query" : "queries"
  const sections = batch.groups.map(
    (group) => `${group.category} (${group.findings.length})\n${group.findings.map(formatFinding).join("\n")}`,
  )

  return {
    subject: `DNS alert: ${batch.findings.length} noteworthy ${noun} (${categories})`,
    text: ["dns-watch flagged the following DNS queries:", ...sections].join("\n\n"),
  }
}

export function createSmtpTransport(smtp: SmtpSettings, timeoutMs: number): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  })
}

export class EmailNotifier implements NotificationSink {
  readonly name = "email"

  constructor(
    private readonly smtp: SmtpSettings,
    private readonly timeoutMs: number,
    private readonly transport: MailTransport = createSmtpTransport(smtp, timeoutMs),
  ) {}

  async send(batch: AlertBatch): Promise<void> {
    const message = formatAlert(batch)

    try {
      await withTimeout("alert email", this.timeoutMs, () =>
        this.transport.sendMail({
          from: this.smtp.from,
          to: this.smtp.to,
          subject: message.subject,
          text: message.text,
        }),
      )
    } catch (error) {
      throw new NotificationError(`Failed to send alert email: ${errorMessage(error)}`, { cause: error })
    }
  }
}

/** Used when no SMTP server is configured; the alert lands in the security log. */
export class LogNotifier implements NotificationSink {
  readonly name = "log"

  constructor(private readonly logger: pino.Logger) {}

  async send(batch: AlertBatch): Promise<void> {
    const message = formatAlert(batch)
    this.logger.warn(
      {
        categories: [...batch.triggeredCategories],
        findingIds: batch.findings.map((finding) => finding.id),
      },
      message.subject,
    )
  }
}

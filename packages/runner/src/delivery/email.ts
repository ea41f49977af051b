// =============================================================================
// @cadence/runner — Email delivery over SMTP
// =============================================================================
// Wraps each report in a small HTML document (banner, report body, footer
// naming the models) and sends it with nodemailer. Throws on failure; the
// pipeline records the outcome and moves on.
// =============================================================================

import nodemailer, { type SendMailOptions } from "nodemailer";
import {
  cadenceLabel,
  escapeHtml,
  timeExternalCall,
  type Cadence,
  type Config,
  type DeliverFn,
  type Logger,
} from "@cadence/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of a nodemailer Transporter that delivery uses. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface EmailDeliveryOptions {
  /** Injected in tests; defaults to an SMTP transport built from config. */
  transport?: MailTransport;
  now?: () => Date;
}

export interface EmailHeader {
  title: string;
  cadence: Cadence;
  date: string;
  tier1Model: string;
  tier2Model: string;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** UTC calendar date, YYYY-MM-DD. */
export function formatSubjectDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function emailSubject(title: string, cadence: Cadence, date: string): string {
  return `[${title}] ${cadenceLabel(cadence)} | ${date}`;
}

const STYLE = [
  "body { font-family: 'Helvetica Neue', Arial, sans-serif; line-height: 1.7; color: #333; max-width: 860px; margin: 0 auto; padding: 20px; }",
  "h3 { border-bottom: 2px solid #333; padding-bottom: 5px; margin-top: 30px; }",
  "li { margin-bottom: 8px; }",
  "table { width: 100%; border-collapse: collapse; margin-top: 10px; }",
  "th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }",
  "th { background-color: #f2f2f2; }",
].join("\n");

/**
 * The report body is model-written HTML and is embedded as is. Header and
 * footer values are escaped.
 */
export function renderEmailHtml(report: string, header: EmailHeader): string {
  const title = escapeHtml(header.title);
  const label = escapeHtml(cadenceLabel(header.cadence));
  const date = escapeHtml(header.date);
  const tiers = escapeHtml(
    `Tier-1: ${header.tier1Model} (Filtering) / Tier-2: ${header.tier2Model} (Analysis)`,
  );

  return [
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<style>\n${STYLE}\n</style>`,
    "</head>",
    "<body>",
    '<div style="background:#1a1a2e; color:#fff; padding:20px; border-radius:8px; margin-bottom:20px; text-align:center;">',
    `  <h1 style="margin:0;">${title}</h1>`,
    `  <p style="margin:5px 0 0 0; font-size:14px; color:#aaa;">${label} | ${date} | 2-Tier AI Pipeline</p>`,
    "</div>",
    report,
    "<br><br>",
    "<hr>",
    '<p style="font-size:11px; color:#999; text-align:center;">',
    `  Generated by ${title}<br>`,
    `  ${tiers}<br>`,
    "</p>",
    "</body>",
    "</html>",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export function createSmtpTransport(config: Config): MailTransport {
  return nodemailer.createTransport({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    // 465 is implicit TLS; other ports upgrade with STARTTLS.
    secure: config.SMTP_PORT === 465,
    requireTLS: config.SMTP_PORT !== 465,
    auth: { user: config.EMAIL_USER, pass: config.EMAIL_PASSWORD },
  });
}

// ---------------------------------------------------------------------------
// DeliverFn
// ---------------------------------------------------------------------------

export function createEmailDelivery(
  config: Config,
  logger: Logger,
  options: EmailDeliveryOptions = {},
): DeliverFn {
  const transport = options.transport ?? createSmtpTransport(config);
  const now = options.now ?? (() => new Date());

  return async (report: string, cadence: Cadence): Promise<void> => {
    const date = formatSubjectDate(now());
    const subject = emailSubject(config.REPORT_TITLE, cadence, date);
    const html = renderEmailHtml(report, {
      title: config.REPORT_TITLE,
      cadence,
      date,
      tier1Model: config.TIER1_MODEL,
      tier2Model: config.TIER2_MODEL,
    });

    await timeExternalCall(logger, "smtp", "sendMail", () =>
      transport.sendMail({
        from: config.EMAIL_USER,
        to: config.EMAIL_RECEIVER,
        subject,
        html,
      }),
    );
    logger.info("Report delivered", { cadence, subject });
  };
}

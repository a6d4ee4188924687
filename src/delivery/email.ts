/**
 * Signal Digest — Email Delivery
 *
 * Sends digests through a configurable provider: the Resend HTTP API,
 * or the console for local runs.
 */

import { z } from 'zod';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

// ============================================================
// TYPES
// ============================================================

export type EmailProvider = 'resend' | 'console';

export interface EmailConfig {
  provider: EmailProvider;
  from: string;
  resendApiKey?: string;
}

export interface EmailRecipient {
  email: string;
  name?: string;
}

export interface EmailMessage {
  to: EmailRecipient[];
  subject: string;
  text: string;
  html?: string;
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
  recipients: string[];
  sentAt: string;
}

export const RESEND_ENDPOINT = 'https://api.resend.com/emails';

const ResendResponseSchema = z.object({ id: z.string() });

// ============================================================
// EMAIL PROVIDERS
// ============================================================

function formatRecipient(recipient: EmailRecipient): string {
  return recipient.name ? `${recipient.name} <${recipient.email}>` : recipient.email;
}

async function sendViaResend(config: EmailConfig, message: EmailMessage): Promise<EmailResult> {
  if (!config.resendApiKey) {
    throw new Error('RESEND_API_KEY not configured');
  }

  const res = await fetch(RESEND_ENDPOINT, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${config.resendApiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      from: config.from,
      to: message.to.map(formatRecipient),
      subject: message.subject,
      text: message.text,
      html: message.html,
    }),
  });

  if (!res.ok) {
    const error = await res.text();
    throw new Error(`Resend API error: ${res.status} - ${error}`);
  }

  const data = ResendResponseSchema.parse(await res.json());

  return {
    success: true,
    messageId: data.id,
    recipients: message.to.map(r => r.email),
    sentAt: new Date().toISOString(),
  };
}

function sendViaConsole(message: EmailMessage): EmailResult {
  console.log('='.repeat(60));
  console.log('EMAIL (Console Provider)');
  console.log('='.repeat(60));
  console.log(`To: ${message.to.map(formatRecipient).join(', ')}`);
  console.log(`Subject: ${message.subject}`);
  console.log('-'.repeat(40));
  console.log(message.text);
  console.log('='.repeat(60));

  return {
    success: true,
    messageId: `console-${Date.now()}`,
    recipients: message.to.map(r => r.email),
    sentAt: new Date().toISOString(),
  };
}

// ============================================================
// SEND FUNCTION
// ============================================================

/**
 * Send an email message. Provider errors come back as an unsuccessful
 * result rather than a rejection.
 */
export async function sendEmail(config: EmailConfig, message: EmailMessage): Promise<EmailResult> {
  logger.info('Sending email', {
    provider: config.provider,
    recipients: message.to.length,
    subject: message.subject,
  });

  try {
    const result =
      config.provider === 'resend' ? await sendViaResend(config, message) : sendViaConsole(message);

    logger.info('Email sent successfully', {
      messageId: result.messageId,
      recipients: result.recipients.length,
    });

    return result;
  } catch (error) {
    const errorMsg = errorMessage(error);
    logger.error('Email send failed', { error: errorMsg });

    return {
      success: false,
      error: errorMsg,
      recipients: message.to.map(r => r.email),
      sentAt: new Date().toISOString(),
    };
  }
}

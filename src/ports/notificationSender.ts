/**
 * Notification sender port.
 */

export interface SendEmailParams {
  to: string | string[];
  subject: string;
  bodyText?: string;
  bodyHtml?: string;
  replyTo?: string;
}

export interface NotificationSenderPort {
  sendEmail(params: SendEmailParams): Promise<void>;
}

/**
 * Picks and sends the notifications that follow a reconciled payment.
 */

import type { NotificationSenderPort } from '../../ports/notificationSender';
import type { PaymentType, RegistrationRecord } from '../../types/tables';
import type { ProgramSettings } from '../settings/settings';
import { participantEmail, participantIdEmail, staffPaymentEmail, type ParticipantEmailKind } from './templates';

const PAYMENT_LABELS: Record<PaymentType, string> = {
  registration_fee: 'Registration fee',
  course_fee: 'Course fee',
  full_payment: 'Full payment',
};

/** Exactly one participant email per successful payment. */
export function selectParticipantEmail(paymentType: PaymentType, fullyPaidAfter: boolean): ParticipantEmailKind {
  if (paymentType === 'full_payment' || fullyPaidAfter) return 'welcome';
  return paymentType === 'course_fee' ? 'course_fee_received' : 'registration_confirmed';
}

export class PaymentNotifier {
  constructor(
    private readonly sender: NotificationSenderPort,
    private readonly settings: ProgramSettings
  ) {}

  async sendParticipantEmail(kind: ParticipantEmailKind, registration: RegistrationRecord): Promise<void> {
    const content = participantEmail(kind, registration, this.settings);
    await this.sender.sendEmail({ to: registration.email, replyTo: this.settings.supportEmail || undefined, ...content });
  }

  async sendParticipantId(registration: RegistrationRecord, participantId: string): Promise<void> {
    const content = participantIdEmail(registration, participantId, this.settings);
    await this.sender.sendEmail({ to: registration.email, replyTo: this.settings.supportEmail || undefined, ...content });
  }

  /** No-op when no staff recipients are configured. */
  async notifyStaff(
    registration: RegistrationRecord,
    payment: { reference: string; amountCents: number; fullyPaid: boolean; paymentType: PaymentType }
  ): Promise<void> {
    const recipients = this.settings.staffNotificationEmails;
    if (recipients.length === 0) return;
    const content = staffPaymentEmail(registration, { ...payment, paymentLabel: PAYMENT_LABELS[payment.paymentType] });
    await this.sender.sendEmail({ to: recipients, ...content });
  }
}

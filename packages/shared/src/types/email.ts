export type EmailPurpose = 'email_verification' | '2fa';

/**
 * Payload handed to the email worker through the message broker
 */
export interface EmailMessage {
  to: string;
  link: string;
  subject: string;
  purpose: EmailPurpose;
}

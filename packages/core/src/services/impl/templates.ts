import type { EmailRecord } from '../../types/email.js';
import type { Category } from '../../types/taxonomy.js';

export interface TemplateContext {
  email: EmailRecord;
  category: Category;
  signature: string;
}

/**
 * Display name for greetings: the `sender_name` metadata field when present,
 * otherwise the local part of the address.
 */
export function senderDisplayName(email: EmailRecord): string {
  const fromMetadata = email.metadata['sender_name']?.trim();
  if (fromMetadata) {
    return fromMetadata;
  }
  const localPart = email.sender.split('@')[0] ?? '';
  return localPart || email.sender;
}

/**
 * Replace `{{placeholder}}` tokens. Unknown tokens are left untouched.
 */
export function fillTemplate(template: string, context: TemplateContext): string {
  const values: Record<string, string> = {
    sender: context.email.sender,
    senderName: senderDisplayName(context.email),
    subject: context.email.subject,
    emailId: context.email.id,
    category: context.category,
    signature: context.signature,
  };

  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (token, name: string) => values[name] ?? token);
}

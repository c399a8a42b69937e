import type { GuardrailSettings } from '@inbox-triage/config';
import type { GuardrailViolation } from '../../errors.js';
import type { EmailRecord } from '../../types/email.js';

// Values shorter than this are too common to count as an echo
const MIN_SENSITIVE_LENGTH = 3;

const PLACEHOLDER_PATTERN = /\[(?:your|customer|company|agent)[^\]]*\]|\{\{\s*[\w.]+\s*\}\}/i;

/**
 * Content checks for a model-drafted reply. An empty list means the draft
 * may be sent.
 */
export function checkGuardrails(
  text: string,
  email: EmailRecord,
  settings: GuardrailSettings
): GuardrailViolation[] {
  const violations: GuardrailViolation[] = [];

  if (text.trim().length === 0) {
    violations.push({ rule: 'empty', message: 'Reply is empty' });
    return violations;
  }

  if (text.length > settings.maxLength) {
    violations.push({
      rule: 'max_length',
      message: `Reply is ${text.length} characters, limit is ${settings.maxLength}`,
    });
  }

  // Only the body licenses an echo; matching ignores case
  const reply = text.toLowerCase();
  const body = email.body.toLowerCase();
  for (const key of settings.sensitiveMetadataKeys) {
    const value = email.metadata[key]?.trim().toLowerCase();
    if (!value || value.length < MIN_SENSITIVE_LENGTH) continue;
    if (reply.includes(value) && !body.includes(value)) {
      violations.push({ rule: 'sensitive_echo', message: `Reply repeats metadata field '${key}'` });
    }
  }

  const placeholder = text.match(PLACEHOLDER_PATTERN);
  if (placeholder) {
    violations.push({ rule: 'placeholder', message: `Reply contains unfilled placeholder ${placeholder[0]}` });
  }

  return violations;
}

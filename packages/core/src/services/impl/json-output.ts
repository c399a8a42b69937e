import type { z } from 'zod';
import { type Result, ok, err } from '@inbox-triage/utils';

/**
 * Pull a JSON value out of model text: plain JSON, a fenced code block, or
 * the first embedded object.
 */
export function parseJsonFromResponse(text: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(text));
  } catch {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
    const fencedContent = fenced?.[1];
    if (fencedContent) {
      try {
        return ok(JSON.parse(fencedContent.trim()));
      } catch {
        return err('Failed to parse JSON from code block');
      }
    }

    const objectMatch = text.match(/\{[\s\S]*\}/);
    if (objectMatch) {
      try {
        return ok(JSON.parse(objectMatch[0]));
      } catch {
        return err('Failed to parse JSON object from text');
      }
    }

    return err('No JSON found in response');
  }
}

/**
 * Parse and validate. Errors are human-readable issue lines.
 */
export function parseModelOutput<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, string[]> {
  if (text.trim() === '') {
    return err(['Response was empty']);
  }
  const parsed = parseJsonFromResponse(text);
  if (!parsed.ok) {
    return err([parsed.error]);
  }

  const validated = schema.safeParse(parsed.value);
  if (!validated.success) {
    return err(
      validated.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return ok(validated.data);
}

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseJsonFromResponse, parseModelOutput } from './json-output.js';

describe('parseJsonFromResponse', () => {
  it('parses plain JSON', () => {
    expect(parseJsonFromResponse('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('parses a fenced code block', () => {
    const text = 'Here you go:\n```json\n{"category": "Sales"}\n```';
    expect(parseJsonFromResponse(text)).toEqual({ ok: true, value: { category: 'Sales' } });
  });

  it('finds an object embedded in prose', () => {
    const text = 'Sure! {"reply": "Hello"} Let me know.';
    expect(parseJsonFromResponse(text)).toEqual({ ok: true, value: { reply: 'Hello' } });
  });

  it('reports text with no JSON', () => {
    expect(parseJsonFromResponse('I cannot help with that')).toEqual({ ok: false, error: 'No JSON found in response' });
  });

  it('reports a broken code block', () => {
    expect(parseJsonFromResponse('```json\n{"a": \n```')).toEqual({
      ok: false,
      error: 'Failed to parse JSON from code block',
    });
  });
});

describe('parseModelOutput', () => {
  const schema = z.object({ reply: z.string() });

  it('returns the validated payload', () => {
    expect(parseModelOutput('{"reply":"Hi"}', schema)).toEqual({ ok: true, value: { reply: 'Hi' } });
  });

  it('reports an empty answer', () => {
    expect(parseModelOutput('  \n', schema)).toEqual({ ok: false, error: ['Response was empty'] });
  });

  it('lists schema issues with their paths', () => {
    expect(parseModelOutput('{"reply": 3}', schema)).toEqual({
      ok: false,
      error: ['reply: Expected string, received number'],
    });
  });
});

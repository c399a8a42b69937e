import { describe, it, expect } from 'vitest';
import { createTaxonomy } from '../../types/taxonomy.js';
import { KeywordFallback } from './keyword-fallback.js';

const taxonomy = createTaxonomy([
  { label: 'Support', description: 'Needs help' },
  { label: 'Sales', description: 'Wants to buy' },
  { label: 'Complaint', description: 'Unhappy' },
  { label: 'Other', description: 'Anything else' },
]);

const fallback = new KeywordFallback(taxonomy, {
  Support: ['help', 'not working', 'error'],
  Sales: ['price', 'quote'],
  Complaint: ['refund', 'broken', 'Refund'],
});

const match = (subject: string, body = '') => fallback.match({ subject, body });

describe('KeywordFallback', () => {
  it('picks the category with the most distinct hits', () => {
    expect(match('Price quote', 'I need help choosing')).toEqual({ category: 'Sales', hits: ['price', 'quote'] });
  });

  it('counts a repeated keyword once', () => {
    expect(match('refund refund refund', 'please help, it is not working')).toEqual({
      category: 'Support',
      hits: ['help', 'not working'],
    });
  });

  it('breaks ties by taxonomy order', () => {
    expect(match('Help with a price').category).toBe('Support');
  });

  it('searches subject and body case-insensitively', () => {
    expect(match('Order 1042', 'It arrived BROKEN.')).toEqual({ category: 'Complaint', hits: ['broken'] });
  });

  it('matches whole words only', () => {
    expect(match('Very helpful team', 'Errors in terrorist pricing').category).toBe('Other');
  });

  it('falls back to Other when nothing matches', () => {
    expect(match('', '')).toEqual({ category: 'Other', hits: [] });
  });

  it('treats regex characters in keywords literally', () => {
    const special = new KeywordFallback(taxonomy, { Sales: ['c++ license'] });

    expect(special.match({ subject: 'Need a C++ license', body: '' }).category).toBe('Sales');
    expect(special.match({ subject: 'Need a cxx license', body: '' }).category).toBe('Other');
  });
});

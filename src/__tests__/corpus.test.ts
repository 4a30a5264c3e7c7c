import { describe, it, expect, vi } from 'vitest';
import { parseCorpus } from '../core/corpus';

function warnSpy() {
  return { debug: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseCorpus', () => {
  it('keeps well-formed records in their original order', () => {
    const records = parseCorpus([
      { id: 2, question: 'Solve 2x + 3 = 7.', domain: 'Algebra', subdomain: 'Linear equations' },
      { id: 1, question: 'What is the derivative of x^2?', domain: 'Calculus', subdomain: 'Derivatives' },
    ]);

    expect(records).toEqual([
      { id: 2, text: 'Solve 2x + 3 = 7.', domain: 'Algebra', subdomain: 'Linear equations' },
      { id: 1, text: 'What is the derivative of x^2?', domain: 'Calculus', subdomain: 'Derivatives' },
    ]);
    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it('accepts a text field and numeric string ids', () => {
    expect(parseCorpus([{ id: '42', text: 'Define a ring.', domain: 'Algebra', subdomain: 'Rings' }])).toEqual([
      { id: 42, text: 'Define a ring.', domain: 'Algebra', subdomain: 'Rings' },
    ]);
  });

  it('labels missing categories as Unknown', () => {
    expect(parseCorpus([{ id: 5, question: 'Is 91 prime?', domain: null }])).toEqual([
      { id: 5, text: 'Is 91 prime?', domain: 'Unknown', subdomain: 'Unknown' },
    ]);
  });

  it('skips malformed entries with a warning', () => {
    const logger = warnSpy();
    const records = parseCorpus([
      { id: 1, domain: 'Algebra', subdomain: 'Groups' },
      { id: 2, question: '   ' },
      { question: 'No id here' },
      'not an object',
      { id: 3, question: 'Prove that the square root of 2 is irrational.' },
    ], logger);

    expect(records.map((record) => record.id)).toEqual([3]);
    expect(logger.warn).toHaveBeenCalledTimes(4);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Skipping corpus entry #0: question: question text is missing or blank');
  });

  it('skips ids that do not fit in a safe integer', () => {
    const logger = warnSpy();
    const records = parseCorpus([
      { id: '9007199254740993', question: 'Is this id kept?' },
      { id: 2.5, question: 'Is this one?' },
      { id: '9007199254740991', question: 'The largest safe id.' },
    ], logger);

    expect(records.map((record) => record.id)).toEqual([9007199254740991]);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Skipping corpus entry #0: id: question id must be a safe integer');
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'Skipping corpus entry #1: id: question id must be a safe integer');
  });

  it('skips repeated ids', () => {
    const logger = warnSpy();
    const records = parseCorpus([
      { id: 1, question: 'First' },
      { id: 1, question: 'Second' },
    ], logger);

    expect(records.map((record) => record.text)).toEqual(['First']);
    expect(logger.warn).toHaveBeenCalledWith('Skipping corpus entry #1: duplicate question id 1');
  });
});

import { describe, it, expect } from 'vitest';
import { classifyReply } from '../core/conversation';

describe('classifyReply', () => {
  it.each(['accept', 'yes', 'OK', ' Confirm '])('treats "%s" as acceptance', (reply) => {
    expect(classifyReply(reply)).toBe('accept');
  });

  it.each(['reject', 'no', 'Revise', 'change'])('treats "%s" as a revision request', (reply) => {
    expect(classifyReply(reply)).toBe('revise');
  });

  it('leaves anything else to the caller', () => {
    expect(classifyReply('yes please')).toBe('other');
    expect(classifyReply('')).toBe('other');
  });
});

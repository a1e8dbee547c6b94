/**
 * Transaction Amount Validation Unit Tests
 */

import { validationResult } from 'express-validator';
import { amountValidation, MAX_AMOUNT } from '../../../src/services/transaction';

const validate = async (body: unknown) => {
  const req = { body };
  for (const chain of amountValidation) {
    await chain.run(req);
  }
  return validationResult(req);
};

describe('Amount Validation', () => {
  it.each(['150', '0', '+5', '007', String(MAX_AMOUNT)])('should accept %p', async (body) => {
    const result = await validate(body);

    expect(result.isEmpty()).toBe(true);
  });

  it.each([
    ['a word', 'not-a-number'],
    ['an empty body', ''],
    ['a negative amount', '-100'],
    ['a decimal', '1.5'],
    ['exponent notation', '1e3'],
    ['leading whitespace', ' 150'],
    ['a trailing newline', '150\n'],
    ['an amount past the safe integer range', '999999999999999999'],
  ])('should reject %s', async (_label, body) => {
    const result = await validate(body);

    expect(result.isEmpty()).toBe(false);
  });

  it('should reject a body that was never parsed as text', async () => {
    const result = await validate({});

    expect(result.isEmpty()).toBe(false);
    expect(result.array()[0].msg).toBe('Amount must be sent as a plain-text body');
  });

  it('should report one message per failing body', async () => {
    const result = await validate('-100');

    expect(result.array().map((err) => err.msg)).toEqual([
      `Amount must be between 0 and ${MAX_AMOUNT}`,
    ]);
  });
});

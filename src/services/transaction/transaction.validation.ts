import { body } from 'express-validator';

/**
 * Largest amount that still round-trips through a JS number
 */
export const MAX_AMOUNT = Number.MAX_SAFE_INTEGER;

/**
 * The whole plain-text body is the amount: one base-10 integer, no
 * surrounding whitespace, non-negative and within the safe integer range.
 */
export const amountValidation = [
  body()
    .isString()
    .withMessage('Amount must be sent as a plain-text body')
    .bail()
    .matches(/^[+-]?[0-9]+$/)
    .withMessage('Amount must be a base-10 integer')
    .bail()
    .isInt({ min: 0, max: MAX_AMOUNT })
    .withMessage(`Amount must be between 0 and ${MAX_AMOUNT}`),
];

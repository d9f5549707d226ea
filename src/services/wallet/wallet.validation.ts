import { body } from 'express-validator';

export const depositValidation = [
  body('amount')
    .exists()
    .withMessage('Amount is required')
    .isInt({ min: 1 })
    .withMessage('Amount must be a positive integer in minor units')
    .toInt(),
];

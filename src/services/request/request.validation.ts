import { body, param, query } from 'express-validator';
import { config } from '../../config';
import { isIdentity } from './request.types';

/**
 * Shape checks only. Domain rules (positive amount, future deadline, known
 * payer) are enforced by the ledger so its own errors reach the client.
 */

const requestIdParam = param('id')
  .isInt({ min: 0 })
  .withMessage('Request id must be a non-negative integer')
  .toInt();

export const createRequestValidation = [
  body('payer')
    .exists()
    .withMessage('Payer is required')
    .isString()
    .withMessage('Payer must be a string'),
  body('amount')
    .exists()
    .withMessage('Amount is required')
    .isInt()
    .withMessage('Amount must be an integer in minor units')
    .toInt(),
  body('deadline')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Deadline must be a non-negative integer of unix seconds')
    .toInt(),
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: config.ledger.maxDescriptionLength })
    .withMessage(`Description cannot exceed ${config.ledger.maxDescriptionLength} characters`),
];

export const payRequestValidation = [
  requestIdParam,
  body('value')
    .exists()
    .withMessage('Value is required')
    .isInt({ min: 0 })
    .withMessage('Value must be a non-negative integer in minor units')
    .toInt(),
];

export const requestIdValidation = [requestIdParam];

export const identityParamValidation = [
  // Compared as-is with token subjects, which are not trimmed
  param('identity').custom(isIdentity).withMessage('Identity is required'),
];

export const eventsQueryValidation = [
  query('after')
    .optional()
    .isInt({ min: 0 })
    .withMessage('After must be a non-negative integer')
    .toInt(),
];

/**
 * Field validation for todo inputs
 *
 * The store validates every field it writes, whichever transport the value
 * came through. Each helper returns the value to store or throws ValidationError.
 */

import {
  TITLE_MIN_LENGTH,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  characterLength,
  normalizeDueDate,
} from '@todo/shared-types';
import { ValidationError } from './errors.js';

export function validateTitle(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Title must be a string', 'title');
  }
  const length = characterLength(value);
  if (length < TITLE_MIN_LENGTH || length > TITLE_MAX_LENGTH) {
    throw new ValidationError(
      `Title must be between ${TITLE_MIN_LENGTH} and ${TITLE_MAX_LENGTH} characters`,
      'title'
    );
  }
  return value;
}

export function validateDescription(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new ValidationError('Description must be a string', 'description');
  }
  if (characterLength(value) > DESCRIPTION_MAX_LENGTH) {
    throw new ValidationError(
      `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
      'description'
    );
  }
  return value;
}

export function validateCompleted(value: unknown): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError('Completed must be a boolean', 'completed');
  }
  return value;
}

/**
 * null, undefined and "" all mean "no due date"
 */
export function validateDueDate(value: unknown): string | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError('Due date must be an ISO 8601 date string', 'due_date');
  }

  const normalized = normalizeDueDate(value);
  if (normalized === null) {
    throw new ValidationError(
      `Invalid due date "${value}": expected YYYY-MM-DD or an ISO 8601 timestamp`,
      'due_date'
    );
  }
  return normalized;
}

/**
 * Record Validator
 *
 * Field-level checks run before any persistence action. Each rule is
 * independent and reports at most one issue for its field.
 */

import { FIELD_LIMITS } from '../constants/schema';
import type { ValidationIssue } from '../errors';
import { isValidUuid, parseCommaList, truncate } from '../utils';
import type { MetadataRecord } from './record';

export interface ValidateOptions {
  /** Report an empty name. Persistence actions turn this on. */
  requireName?: boolean;
}

export function validateName(name: string, required = false): string | null {
  if (!name) {
    return required ? 'Name is required' : null;
  }
  if (name.length > FIELD_LIMITS.NAME_MAX) {
    return `Name too long (${name.length}/${FIELD_LIMITS.NAME_MAX} characters)`;
  }
  return null;
}

export function validateDescription(description: string): string | null {
  if (description.length > FIELD_LIMITS.DESCRIPTION_MAX) {
    return `Description too long (${description.length}/${FIELD_LIMITS.DESCRIPTION_MAX} characters)`;
  }
  return null;
}

/**
 * Tags are counted after splitting on commas and dropping empty entries
 */
export function validateTags(tags: string): string | null {
  const items = parseCommaList(tags);
  if (items.length > FIELD_LIMITS.TAGS_MAX_COUNT) {
    return `Too many tags (${items.length}/${FIELD_LIMITS.TAGS_MAX_COUNT})`;
  }
  const tooLong = items.find(tag => tag.length > FIELD_LIMITS.TAG_MAX_LENGTH);
  if (tooLong) {
    return `Tag '${truncate(tooLong, 20)}' too long (${tooLong.length}/${FIELD_LIMITS.TAG_MAX_LENGTH} chars)`;
  }
  return null;
}

export function validateLineageId(lineageId: string): string | null {
  if (lineageId && !isValidUuid(lineageId)) {
    return 'Lineage ID must be a valid UUID v4';
  }
  return null;
}

/**
 * Validate the record. An empty list means valid.
 */
export function validate(record: MetadataRecord, options: ValidateOptions = {}): ValidationIssue[] {
  const checks: Array<[string, string | null]> = [
    ['name', validateName(record.core.assetName, options.requireName ?? false)],
    ['description', validateDescription(record.core.description)],
    ['tags', validateTags(record.core.tags)],
    ['lineageId', validateLineageId(record.lineage.lineageId)],
  ];

  const issues: ValidationIssue[] = [];
  for (const [field, message] of checks) {
    if (message) {
      issues.push({ field, message });
    }
  }
  return issues;
}

/**
 * Job Metadata
 *
 * The dispatcher puts the dial info in the job metadata, either as JSON
 * or as a bare phone number.
 * @module agent/job-metadata
 */

import { z } from 'zod';
import { JobMetadataError } from '../core/exceptions.js';
import { validatePhoneNumber } from '../telephony/config.js';
import type { DialInfo } from '../telephony/types.js';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const dialInfoSchema = z.object({
  phoneNumber: z.string({ required_error: 'phoneNumber is required' }).trim().min(1, 'phoneNumber is required'),
  transferTo: optionalText,
  customerName: optionalText,
  appointmentTime: optionalText,
});

function parseJson(metadata: string): unknown {
  try {
    return JSON.parse(metadata);
  } catch {
    return undefined;
  }
}

function normalizeNumber(field: string, value: string, metadata: string): string {
  const validation = validatePhoneNumber(value);
  if (!validation.isValid || !validation.e164) {
    throw new JobMetadataError(`${field}: ${validation.error ?? 'invalid phone number'}`, metadata);
  }
  return validation.e164;
}

/**
 * Turn the job metadata into dial info. Throws JobMetadataError when
 * there is no usable phone number.
 */
export function parseDialInfo(metadata: string | undefined): DialInfo {
  const raw = metadata?.trim() ?? '';
  if (!raw) {
    throw new JobMetadataError('Job metadata is empty, expected a phone number', metadata);
  }

  const json = parseJson(raw);
  const candidate = typeof json === 'object' && json !== null ? json : { phoneNumber: raw };

  const result = dialInfoSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.errors.map(err => `${err.path.join('.') || 'metadata'}: ${err.message}`);
    throw new JobMetadataError(`Invalid job metadata (${issues.join('; ')})`, raw);
  }

  const { phoneNumber, transferTo, customerName, appointmentTime } = result.data;
  return {
    phoneNumber: normalizeNumber('phoneNumber', phoneNumber, raw),
    transferTo: transferTo ? normalizeNumber('transferTo', transferTo, raw) : undefined,
    customerName,
    appointmentTime,
  };
}

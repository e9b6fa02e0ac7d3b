/**
 * Telephony Configuration - SIP trunk settings and phone numbers
 *
 * Helpers on top of the validated app config:
 * - Outbound trunk lookup
 * - Phone number normalization
 * - Room naming for dispatched calls
 */

import type { TelephonyConfig } from '../core/config.js';
import { ConfigurationError } from '../core/exceptions.js';

/**
 * Prefix for rooms created for outbound calls
 */
export const CALL_ROOM_PREFIX = 'outbound-';

/**
 * Outbound SIP trunk to dial through; dialing is impossible without it
 */
export function requireOutboundTrunkId(telephony: TelephonyConfig): string {
  if (!telephony.outboundTrunkId) {
    throw new ConfigurationError('SIP_OUTBOUND_TRUNK_ID is required to place outbound calls');
  }
  return telephony.outboundTrunkId;
}

export interface PhoneNumberValidation {
  isValid: boolean;
  e164?: string;
  error?: string;
}

/**
 * Validate phone number format (basic E.164 check)
 */
export function validatePhoneNumber(phoneNumber: string): PhoneNumberValidation {
  // Remove all non-digit characters except leading +
  const cleaned = phoneNumber.replace(/[^\d+]/g, '');

  // Must start with + and have 10-15 digits
  if (/^\+[1-9]\d{9,14}$/.test(cleaned)) {
    return { isValid: true, e164: cleaned };
  }

  // Try adding + if it's missing
  if (/^[1-9]\d{9,14}$/.test(cleaned)) {
    return { isValid: true, e164: '+' + cleaned };
  }

  return {
    isValid: false,
    error: 'Invalid phone number format. Expected E.164 format (e.g., +15550100123)',
  };
}

/**
 * Generate a unique room name for an outbound call
 */
export function generateCallRoomName(phoneNumber: string): string {
  const uniqueId = Date.now().toString(36) + Math.random().toString(36).substring(2, 8);
  return `${CALL_ROOM_PREFIX}${phoneNumber.replace(/\D/g, '').slice(-4)}_${uniqueId}`;
}

/**
 * Normalizes a phone number to E.164 so that "+1 (408) 555-0100", "408-555-0100"
 * and "14085550100" all resolve to the same patient.
 * - 10 digits: US number, prefixed with +1
 * - 11 digits starting with 1: US number with country code
 * - anything else: digits prefixed with +
 * @returns E.164 string, or empty string when no digits are present
 */
export function normalizePhone(phone: string | null | undefined): string {
  if (!phone || typeof phone !== 'string') return '';
  const digits = phone.replace(/\D/g, '');
  if (digits.length === 0) return '';
  if (digits.length === 10) {
    return `+1${digits}`;
  }
  return `+${digits}`;
}

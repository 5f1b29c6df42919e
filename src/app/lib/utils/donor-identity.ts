import { ValidationError, type FieldErrors } from '@/app/lib/errors';

export const ANONYMOUS_NAME = 'Anonymous';
export const FALLBACK_EMAIL_DOMAIN = 'mailinator.com';
export const DEFAULT_COUNTRY = 'US';

// Same shape browsers and most mail libraries accept
const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;
const US_ZIP_PATTERN = /^\d{5}(-\d{4})?$/;
const US_COUNTRY_NAMES = new Set(['US', 'USA', 'UNITED STATES']);

/**
 * Partial donor attributes as they arrive from a form or an import record.
 */
export interface DonorIdentityHints {
  name?: string | null;
  email?: string | null;
  phone?: string | null;
  addressLine1?: string | null;
  addressLine2?: string | null;
  city?: string | null;
  state?: string | null;
  zipCode?: string | null;
  country?: string | null;
}

export interface DonorIdentity {
  name: string;
  email: string;
  phone: string | null;
  addressLine1: string | null;
  addressLine2: string | null;
  city: string | null;
  state: string | null;
  zipCode: string | null;
  country: string;
}

export function isBlank(value: string | null | undefined): value is null | undefined | '' {
  return value === null || value === undefined || value.trim() === '';
}

function presence(value: string | null | undefined): string | null {
  return isBlank(value) ? null : value.trim();
}

function compact(value: string): string {
  return value.toLowerCase().replace(/\s+/g, '');
}

export function isUnitedStates(country: string | null | undefined): boolean {
  return isBlank(country) || US_COUNTRY_NAMES.has(country.trim().toUpperCase());
}

/**
 * Pads 4-digit US zip codes that lost their leading zero ("6419" -> "06419").
 */
export function normalizeZipCode(
  zipCode: string | null | undefined,
  country: string | null | undefined
): string | null {
  const zip = presence(zipCode);
  if (zip === null) return null;
  if (isUnitedStates(country) && /^\d{4}$/.test(zip)) {
    return `0${zip}`;
  }
  return zip;
}

/**
 * Builds a placeholder address for donors who gave no email, preferring the
 * most identifying attribute available.
 */
export function fallbackEmail(hints: DonorIdentityHints): string {
  const name = presence(hints.name);
  if (name !== null && name !== ANONYMOUS_NAME) {
    return `${name.replace(/\s+/g, '')}@${FALLBACK_EMAIL_DOMAIN}`;
  }

  const phoneDigits = (hints.phone ?? '').replace(/\D/g, '');
  if (phoneDigits.length > 0) {
    return `anonymous-${phoneDigits}@${FALLBACK_EMAIL_DOMAIN}`;
  }

  const street = presence(hints.addressLine1) ?? presence(hints.addressLine2);
  const city = presence(hints.city);
  if (street !== null || city !== null) {
    const parts = [street, city].filter((part): part is string => part !== null).map(compact);
    return `anonymous-${parts.join('-')}@${FALLBACK_EMAIL_DOMAIN}`;
  }

  return `${ANONYMOUS_NAME}@${FALLBACK_EMAIL_DOMAIN}`;
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * Resolves raw donor attributes into a complete identity.
 *
 * Blank names become "Anonymous" and blank emails are derived through
 * {@link fallbackEmail}. Every invalid field is reported in one ValidationError.
 * Email uniqueness is a persistence concern and is not checked here.
 */
export function resolveDonorIdentity(hints: DonorIdentityHints): DonorIdentity {
  const errors: FieldErrors = {};

  const name = presence(hints.name) ?? ANONYMOUS_NAME;
  const explicitEmail = presence(hints.email);
  const email = explicitEmail ?? fallbackEmail({ ...hints, name });
  if (explicitEmail !== null && !isValidEmail(explicitEmail)) {
    errors.email = ['is invalid'];
  }

  const phone = presence(hints.phone);
  if (phone !== null) {
    const digits = phone.replace(/\D/g, '').length;
    if (digits < 10 || digits > 15) {
      errors.phone = ['is invalid'];
    }
  }

  const country = presence(hints.country) ?? DEFAULT_COUNTRY;
  const zipCode = normalizeZipCode(hints.zipCode, country);
  if (zipCode !== null && isUnitedStates(country) && !US_ZIP_PATTERN.test(zipCode)) {
    errors.zip_code = ['is invalid'];
  }

  if (Object.keys(errors).length > 0) {
    throw new ValidationError(errors);
  }

  return {
    name,
    email,
    phone,
    addressLine1: presence(hints.addressLine1),
    addressLine2: presence(hints.addressLine2),
    city: presence(hints.city),
    state: presence(hints.state),
    zipCode,
    country,
  };
}

/**
 * Mailing address as printed on a receipt, or null when nothing is on file.
 */
export function fullAddress(donor: {
  addressLine1: string | null;
  addressLine2: string | null;
  city: string | null;
  state: string | null;
  zipCode: string | null;
}): string | null {
  const locality = [donor.city, donor.state, donor.zipCode]
    .map(presence)
    .filter((part): part is string => part !== null)
    .join(' ');
  const lines = [presence(donor.addressLine1), presence(donor.addressLine2), presence(locality)].filter(
    (line): line is string => line !== null
  );
  return lines.length > 0 ? lines.join('\n') : null;
}

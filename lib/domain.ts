import { toASCII } from 'punycode';
import { InvalidDomainError } from './errors';

const MAX_LABEL_LENGTH = 63;

/**
 * A domain needs at least two dot-separated labels, none empty, none longer
 * than 63 characters.
 */
export function isValidDomain(domain: string): boolean {
  if (!domain) return false;
  const labels = domain.split('.');
  if (labels.length < 2) return false;
  return labels.every((label) => label.length > 0 && label.length <= MAX_LABEL_LENGTH);
}

/**
 * Normalize user input to the ASCII (punycode), lowercase form crt.sh indexes.
 * Does not validate.
 */
export function normalizeDomain(input: string): string {
  let s = input.trim();
  if (s.endsWith('.')) s = s.slice(0, -1);
  try {
    s = toASCII(s);
  } catch {
    // leave as typed; validation reports it
  }
  return s.toLowerCase();
}

export function assertValidDomain(input: string): string {
  const domain = normalizeDomain(input);
  if (!isValidDomain(domain)) {
    throw new InvalidDomainError(input);
  }
  return domain;
}

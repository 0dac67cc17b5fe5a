// SPDX-License-Identifier: Apache-2.0

/**
 * @include DNS_1123_LABEL
 * @param value - the string to check
 * @returns true if the string is a valid DNS-1123 label
 */
export function isDns1123Label(value: string): boolean {
  return /^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/.test(value);
}

/**
 * A ConfigMap name must be a valid DNS-1123 subdomain: lower case alphanumeric characters, '-' or '.', starting and
 * ending with an alphanumeric character, at most 253 characters.
 * @param value - the string to check
 */
export function isDns1123Subdomain(value: string): boolean {
  return value.length <= 253 && /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/.test(value);
}

/**
 * Mask a secret for log output, keeping the first and last characters of
 * anything longer than two characters
 */
export function maskSecret(secret: string): string {
  if (secret === '') {
    return '<empty>';
  }
  if (secret.length <= 2) {
    return '*'.repeat(secret.length);
  }
  return `${secret[0]}${'*'.repeat(secret.length - 2)}${secret[secret.length - 1]}`;
}

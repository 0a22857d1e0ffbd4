// Printable ASCII plus tab, newline and carriage return.
const NON_PORTABLE = /[^\x09\x0A\x0D\x20-\x7E]+/g;

export function sanitizeText(value: string): string {
  return value.replace(NON_PORTABLE, '');
}

export function sanitizeOptional(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return sanitizeText(value);
}

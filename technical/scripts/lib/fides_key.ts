export const FIDES_KEY_PATTERN = /^[a-zA-Z0-9_.<>-]+$/;

export const DEFAULT_ORGANIZATION_KEY = 'default_organization';

export function isFidesKey(value: unknown): value is string {
  return typeof value === 'string' && FIDES_KEY_PATTERN.test(value);
}

/**
 * Parent implied by the dotted key: `a.b.c` -> `a.b`, `a` -> null.
 */
export function parentKeyFromFidesKey(value: string): string | null {
  const index = value.lastIndexOf('.');
  return index === -1 ? null : value.slice(0, index);
}

export function lastKeySegment(value: string): string {
  const index = value.lastIndexOf('.');
  return index === -1 ? value : value.slice(index + 1);
}

export function joinFidesKey(parentKey: string | null, segment: string): string {
  return parentKey ? `${parentKey}.${segment}` : segment;
}

export function normalizeKeySegment(value: string): string {
  return value
    .trim()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function normalizeAndValidateKeySegment(value: string): string {
  const raw = value.trim();
  if (!raw) {
    throw new Error('key segment is required');
  }

  const normalized = normalizeKeySegment(raw);
  if (!normalized) {
    throw new Error(`Invalid key segment '${value}'. Expected snake_case, e.g. contact_details`);
  }

  return normalized;
}

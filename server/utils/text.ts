/** True when the value is a string with at least one non-whitespace character. */
export const hasText = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim().length > 0;

export const cleanText = (value: string | null | undefined): string | undefined =>
  hasText(value) ? value.trim() : undefined;

export const splitCommaList = (value: string | null | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
};

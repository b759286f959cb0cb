const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const sanitizeString = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export const isValidEmail = (value: string): boolean => EMAIL_REGEX.test(value.toLowerCase());

export const assertValidEmail = (value: string, fieldName: string): void => {
  if (!isValidEmail(value)) {
    throw new Error(`Field ${fieldName} must be a valid email address.`);
  }
};

export const assertNonEmpty = (value: string, fieldName: string): void => {
  if (!value) {
    throw new Error(`Field ${fieldName} is required.`);
  }
};

// Items are trimmed, never dropped: a blank entry stays so it can be rejected downstream.
export const sanitizeList = (value: unknown): string[] =>
  Array.isArray(value) ? value.map((item) => sanitizeString(item)) : [];

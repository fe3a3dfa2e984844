import { InvalidOptionError } from '../errors/DomainErrors.js';

export const SORT_OPTIONS = ['base', 'position', 'strand', 'quality', 'sample', 'readGroup'] as const;

export type SortOption = (typeof SORT_OPTIONS)[number];

export function isSortOption(value: string): value is SortOption {
  return SORT_OPTIONS.some((option) => option === value);
}

/** 大小寫敏感：IGV 只認 readGroup，不認 readgroup */
export function parseSortOption(value: string): SortOption {
  if (!isSortOption(value)) {
    throw new InvalidOptionError(value, SORT_OPTIONS);
  }
  return value;
}

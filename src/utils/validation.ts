import { z } from 'zod';
import { PaginationQuery } from '../types/request.types';

const positiveIntFromQuery = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : Number(value)),
    z.number({ invalid_type_error: 'Must be a number' }).int('Must be an integer').positive('Must be positive')
  );

/**
 * `?page=&limit=` (or `page_size=`) with a default size and an upper bound
 */
export const paginationSchema = (defaultLimit: number = 20, maxLimit: number = 100) =>
  z
    .object({
      page: positiveIntFromQuery(1),
      limit: positiveIntFromQuery(defaultLimit).optional(),
      page_size: positiveIntFromQuery(defaultLimit).optional(),
    })
    .transform(({ page, limit, page_size }): PaginationQuery => ({
      page,
      limit: Math.min(page_size ?? limit ?? defaultLimit, maxLimit),
    }));

export const offsetOf = ({ page, limit }: PaginationQuery): number => (page - 1) * limit;

// Route params and ids arriving as strings
export const idSchema = z.coerce.number({ invalid_type_error: 'Must be a number' }).int().positive('Must be a positive id');

/**
 * Safe date formatting for DATE columns, which arrive as Date or as 'YYYY-MM-DD'
 */
export const toDateString = (value: Date | string | null): string | null => {
  if (value === null) return null;
  if (typeof value === 'string') return value.slice(0, 10);
  // node-postgres builds local midnight; anything else arrives as UTC midnight
  if (value.getUTCHours() === 0 && value.getUTCMinutes() === 0 && value.getUTCSeconds() === 0 && value.getUTCMilliseconds() === 0) {
    return value.toISOString().slice(0, 10);
  }
  const month = String(value.getMonth() + 1).padStart(2, '0');
  const day = String(value.getDate()).padStart(2, '0');
  return `${value.getFullYear()}-${month}-${day}`;
};

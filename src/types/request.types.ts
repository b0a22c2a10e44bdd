import { Request } from 'express';

/**
 * Auth Request - Request carrying the authenticated user
 */
export interface AuthUser {
  id: number;
  email: string;
  phone_number: string;
  first_name: string;
  last_name: string;
  is_staff: boolean;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

/**
 * Pagination Query Parameters (after parsing)
 */
export interface PaginationQuery {
  page: number;
  limit: number;
}

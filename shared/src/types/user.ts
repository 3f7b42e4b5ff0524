/**
 * User-related types and interfaces.
 */

export interface User {
  id: string;
  email: string;
  name: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  createdAt: string;
  updatedAt: string;
}

/** User response shape for API responses (never includes the password hash) */
export interface UserResponse {
  id: string;
  email: string;
  name: string;
  isStaff: boolean;
  createdAt: string;
  updatedAt?: string;
}

/**
 * Request body for POST /api/users (signup).
 */
export interface CreateUserRequest {
  email: string;
  password: string;
  name?: string;
}

/**
 * Request body for PATCH /api/users/me.
 * At least one field must be provided.
 */
export interface UpdateUserRequest {
  name?: string;
  password?: string;
}

/**
 * Response for POST /api/auth/login.
 * The token is also set as the session cookie; API clients may send it as
 * `Authorization: Token <token>` instead.
 */
export interface LoginResponse {
  user: UserResponse;
  token: string;
}

import { UserPreferences } from "./entities";

// Registration input
export interface RegisterUserRequest extends Partial<UserPreferences> {
  name: string;
  fullName: string;
  email: string;
  password?: string;
  roleId: string;
  institutionId?: string | null;
  parentId?: string | null;
}

// Lookup by id, falling back to name
export interface UserLookupParams {
  userId?: string;
  name?: string;
}

// Result of a password reset; the caller owns delivery
export interface PasswordResetResult {
  userId: string;
  temporaryPassword: string;
}

import { RoleKind } from "./enums";

// Re-export enums for convenience
export { RoleKind };

// Role entity (reference data)
export interface Role {
  id: string;
  name: string;
  kind: RoleKind;
  parentId: string | null;
}

export interface UserPreferences {
  copyOfEmails: boolean;
  emailOnReview: boolean;
  emailOnSubmission: boolean;
  emailOnReviewOfReview: boolean;
  etcIconsOnHomepage: boolean;
}

// User entity
export interface User extends UserPreferences {
  id: string;
  name: string; // lowercase login handle, unique
  fullName: string;
  email: string;
  passwordDigest: string | null; // bcrypt hash
  roleId: string;
  institutionId: string | null;
  parentId: string | null; // account that created this one
  isNewUser: boolean;
}

// Course entity, owned by the course service
export interface Course {
  id: string;
  name: string;
  instructorId: string | null; // instructor of record
  institutionId: string | null;
}

// TA to course mapping
export interface TaMapping {
  taId: string;
  courseId: string;
}

export interface Assignment {
  id: string;
  courseId: string;
  name: string;
}

export interface Participant {
  id: string;
  assignmentId: string;
  userId: string;
}

// Role as stored; its kind is resolved from the name when the role graph is built
export type RoleRecord = Omit<Role, "kind">;

import { Course, RoleRecord, User } from "../types/entities";

export type UserPatch = Partial<Omit<User, "id">>;

/**
 * Persistence collaborator. Everything the authorization core knows about
 * users, roles, courses and assignments comes through this interface.
 */
export interface RecordStore {
  // Users
  findUserById(id: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  findUsersByName(name: string): Promise<User[]>;
  /** Case-insensitive literal substring match on full name, at most `limit` rows. */
  findUsersByFullNameSubstring(pattern: string, limit: number): Promise<User[]>;
  findUsersByRoleIds(roleIds: string[]): Promise<User[]>;
  /** Clear parentId on every child of the user in one write; returns how many changed. */
  detachChildUsers(parentId: string): Promise<number>;
  /** Throws ConflictError when the name is already taken. */
  insertUser(user: User): Promise<User>;
  updateUser(id: string, patch: UserPatch): Promise<User | null>;
  deleteUser(id: string): Promise<void>;

  // Roles
  listRoles(): Promise<RoleRecord[]>;
  findRoleById(id: string): Promise<RoleRecord | null>;

  // Courses and participation
  listCoursesByInstructor(instructorId: string): Promise<Course[]>;
  /** Courses the TA is mapped to, in mapping order. */
  listCoursesForTa(taId: string): Promise<Course[]>;
  listAssignmentIdsForCourses(courseIds: string[]): Promise<string[]>;
  participantExists(userId: string, assignmentIds: string[]): Promise<boolean>;
}

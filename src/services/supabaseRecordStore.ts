import { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { getSupabase } from "../config/supabase";
import { Course, RoleRecord, User } from "../types/entities";
import { ConflictError, DatabaseError } from "../middleware/errorHandler";
import { fetchAllPages } from "../utils/supabasePaginate";
import { logger } from "../utils/logger";
import { RecordStore, UserPatch } from "./recordStore";

// Integer and uuid keys are both handled as strings
const id = z.union([z.string(), z.number()]).transform(String);
const optionalId = id.nullish().transform((value) => value ?? null);
const flag = (fallback: boolean) =>
  z
    .boolean()
    .nullish()
    .transform((value) => value ?? fallback);

const userRowSchema = z.object({
  id,
  name: z.string(),
  full_name: z.string(),
  email: z.string(),
  password_digest: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  role_id: id,
  institution_id: optionalId,
  parent_id: optionalId,
  copy_of_emails: flag(false),
  email_on_review: flag(false),
  email_on_submission: flag(false),
  email_on_review_of_review: flag(false),
  etc_icons_on_homepage: flag(true),
  is_new_user: flag(false),
});

const roleRowSchema = z.object({
  id,
  name: z.string(),
  parent_id: optionalId,
});

const courseRowSchema = z.object({
  id,
  name: z.string(),
  instructor_id: optionalId,
  institution_id: optionalId,
});

const taMappingRowSchema = z.object({
  ta_id: id,
  course_id: id,
});

const idRowSchema = z.object({ id });

// Postgres unique_violation
const UNIQUE_VIOLATION = "23505";

type PostgrestFailure = { message: string; code?: string } | null;

// Escape LIKE metacharacters so the pattern matches literally
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function parseRow<T extends z.ZodTypeAny>(
  schema: T,
  table: string,
  row: unknown
): z.output<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    logger.error("Malformed row", { table, issues: result.error.issues });
    throw new DatabaseError(`Malformed ${table} row`);
  }
  return result.data;
}

function toUser(row: unknown): User {
  const parsed = parseRow(userRowSchema, "users", row);
  return {
    id: parsed.id,
    name: parsed.name,
    fullName: parsed.full_name,
    email: parsed.email,
    passwordDigest: parsed.password_digest,
    roleId: parsed.role_id,
    institutionId: parsed.institution_id,
    parentId: parsed.parent_id,
    copyOfEmails: parsed.copy_of_emails,
    emailOnReview: parsed.email_on_review,
    emailOnSubmission: parsed.email_on_submission,
    emailOnReviewOfReview: parsed.email_on_review_of_review,
    etcIconsOnHomepage: parsed.etc_icons_on_homepage,
    isNewUser: parsed.is_new_user,
  };
}

function toRole(row: unknown): RoleRecord {
  const parsed = parseRow(roleRowSchema, "roles", row);
  return { id: parsed.id, name: parsed.name, parentId: parsed.parent_id };
}

function toCourse(row: unknown): Course {
  const parsed = parseRow(courseRowSchema, "courses", row);
  return {
    id: parsed.id,
    name: parsed.name,
    instructorId: parsed.instructor_id,
    institutionId: parsed.institution_id,
  };
}

// Columns left undefined in a patch are not written
export function toUserRow(user: UserPatch & { id?: string }): Record<string, unknown> {
  const row: Record<string, unknown> = {
    id: user.id,
    name: user.name,
    full_name: user.fullName,
    email: user.email,
    password_digest: user.passwordDigest,
    role_id: user.roleId,
    institution_id: user.institutionId,
    parent_id: user.parentId,
    copy_of_emails: user.copyOfEmails,
    email_on_review: user.emailOnReview,
    email_on_submission: user.emailOnSubmission,
    email_on_review_of_review: user.emailOnReviewOfReview,
    etc_icons_on_homepage: user.etcIconsOnHomepage,
    is_new_user: user.isNewUser,
  };
  return Object.fromEntries(
    Object.entries(row).filter(([, value]) => value !== undefined)
  );
}

/**
 * RecordStore over the Supabase tables users, roles, courses, ta_mappings,
 * assignments and participants.
 */
export class SupabaseRecordStore implements RecordStore {
  constructor(private readonly clientFactory: () => SupabaseClient = getSupabase) {}

  private get db(): SupabaseClient {
    return this.clientFactory();
  }

  private failure(operation: string, error: PostgrestFailure): DatabaseError {
    logger.error(`Supabase ${operation} failed`, {
      message: error?.message,
      code: error?.code,
    });
    return new DatabaseError(`Failed to ${operation}`);
  }

  async findUserById(userId: string): Promise<User | null> {
    const { data, error } = await this.db
      .from("users")
      .select("*")
      .eq("id", userId)
      .maybeSingle();
    if (error) throw this.failure("find user by id", error);
    return data ? toUser(data) : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const { data, error } = await this.db
      .from("users")
      .select("*")
      .eq("email", email)
      .order("id")
      .limit(1);
    if (error) throw this.failure("find user by email", error);
    // Email is not unique; the earliest account wins
    const [first] = data ?? [];
    return first ? toUser(first) : null;
  }

  async findUsersByName(name: string): Promise<User[]> {
    const { data, error } = await this.db
      .from("users")
      .select("*")
      .eq("name", name);
    if (error) throw this.failure("find users by name", error);
    return (data ?? []).map(toUser);
  }

  async findUsersByFullNameSubstring(
    pattern: string,
    limit: number
  ): Promise<User[]> {
    const { data, error } = await this.db
      .from("users")
      .select("*")
      .ilike("full_name", `%${escapeLikePattern(pattern)}%`)
      .order("id")
      .limit(limit);
    if (error) throw this.failure("search users by full name", error);
    return (data ?? []).map(toUser);
  }

  async findUsersByRoleIds(roleIds: string[]): Promise<User[]> {
    try {
      const rows = await fetchAllPages(() =>
        this.db.from("users").select("*").in("role_id", roleIds).order("id")
      );
      return rows.map(toUser);
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      throw this.failure("list users by role", toFailure(error));
    }
  }

  async detachChildUsers(parentId: string): Promise<number> {
    const { data, error } = await this.db
      .from("users")
      .update({ parent_id: null })
      .eq("parent_id", parentId)
      .select("id");
    if (error) throw this.failure("detach child users", error);
    return (data ?? []).length;
  }

  async insertUser(user: User): Promise<User> {
    const { data, error } = await this.db
      .from("users")
      .insert(toUserRow(user))
      .select("*")
      .single();
    if (error?.code === UNIQUE_VIOLATION) {
      throw new ConflictError(`Name ${user.name} has already been taken`);
    }
    if (error) throw this.failure("insert user", error);
    return toUser(data);
  }

  async updateUser(userId: string, patch: UserPatch): Promise<User | null> {
    const { data, error } = await this.db
      .from("users")
      .update(toUserRow(patch))
      .eq("id", userId)
      .select("*")
      .maybeSingle();
    if (error) throw this.failure("update user", error);
    return data ? toUser(data) : null;
  }

  async deleteUser(userId: string): Promise<void> {
    const { error } = await this.db.from("users").delete().eq("id", userId);
    if (error) throw this.failure("delete user", error);
  }

  async listRoles(): Promise<RoleRecord[]> {
    try {
      const rows = await fetchAllPages(() =>
        this.db.from("roles").select("*").order("id")
      );
      return rows.map(toRole);
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      throw this.failure("list roles", toFailure(error));
    }
  }

  async findRoleById(roleId: string): Promise<RoleRecord | null> {
    const { data, error } = await this.db
      .from("roles")
      .select("*")
      .eq("id", roleId)
      .maybeSingle();
    if (error) throw this.failure("find role", error);
    return data ? toRole(data) : null;
  }

  async listCoursesByInstructor(instructorId: string): Promise<Course[]> {
    const { data, error } = await this.db
      .from("courses")
      .select("*")
      .eq("instructor_id", instructorId)
      .order("id");
    if (error) throw this.failure("list instructor courses", error);
    return (data ?? []).map(toCourse);
  }

  async listCoursesForTa(taId: string): Promise<Course[]> {
    const { data: mappings, error: mappingError } = await this.db
      .from("ta_mappings")
      .select("*")
      .eq("ta_id", taId)
      .order("id");
    if (mappingError) throw this.failure("list TA mappings", mappingError);

    const courseIds = (mappings ?? []).map(
      (row) => parseRow(taMappingRowSchema, "ta_mappings", row).course_id
    );
    if (courseIds.length === 0) return [];

    const { data, error } = await this.db
      .from("courses")
      .select("*")
      .in("id", courseIds);
    if (error) throw this.failure("list TA courses", error);

    const byId = new Map(
      (data ?? []).map(toCourse).map((course) => [course.id, course] as const)
    );
    return courseIds.flatMap((courseId) => {
      const course = byId.get(courseId);
      return course ? [course] : [];
    });
  }

  async listAssignmentIdsForCourses(courseIds: string[]): Promise<string[]> {
    if (courseIds.length === 0) return [];
    try {
      const rows = await fetchAllPages(() =>
        this.db
          .from("assignments")
          .select("id")
          .in("course_id", courseIds)
          .order("id")
      );
      return rows.map((row) => parseRow(idRowSchema, "assignments", row).id);
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      throw this.failure("list course assignments", toFailure(error));
    }
  }

  async participantExists(
    userId: string,
    assignmentIds: string[]
  ): Promise<boolean> {
    if (assignmentIds.length === 0) return false;
    const { data, error } = await this.db
      .from("participants")
      .select("id")
      .eq("user_id", userId)
      .in("assignment_id", assignmentIds)
      .limit(1);
    if (error) throw this.failure("check participation", error);
    return (data ?? []).length > 0;
  }
}

function toFailure(error: unknown): PostgrestFailure {
  if (error instanceof Error) return { message: error.message };
  const parsed = z
    .object({ message: z.string(), code: z.string().optional() })
    .safeParse(error);
  return parsed.success ? parsed.data : { message: String(error) };
}

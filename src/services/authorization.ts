import { RoleKind, User } from "../types/entities";
import { UnsupportedRoleError } from "../middleware/errorHandler";
import { logger } from "../utils/logger";
import { CourseMembershipIndex } from "./courseMembership";
import { RoleGraph } from "./roleGraph";

type Subject = Pick<User, "id" | "roleId">;

/**
 * Answers whether one user may act for, or is responsible for, another.
 * Every predicate is a pure function of its arguments and the stored data.
 */
export class AuthorizationEngine {
  constructor(
    private readonly roleGraph: RoleGraph,
    private readonly membership: CourseMembershipIndex
  ) {}

  /**
   * Whether `actor` may impersonate `target`.
   *
   * Instructors and TAs are limited to the users their courses relate them
   * to; they never fall through to the parent-chain check, however their
   * roles are wired.
   */
  async canImpersonate(actor: Subject, target: Subject): Promise<boolean> {
    const allowed = await this.evaluateImpersonation(actor, target);
    logger.debug("Impersonation check", {
      actorId: actor.id,
      targetId: target.id,
      allowed,
    });
    return allowed;
  }

  private async evaluateImpersonation(
    actor: Subject,
    target: Subject
  ): Promise<boolean> {
    const actorRole = this.roleGraph.roleOf(actor);

    if (actorRole.kind === RoleKind.SUPER_ADMINISTRATOR) return true;

    if (await this.isInstructorFor(actor, target)) return true;
    if (actorRole.kind === RoleKind.INSTRUCTOR) return false;

    if (await this.isTeachingAssistantFor(actor, target)) return true;
    if (actorRole.kind === RoleKind.TEACHING_ASSISTANT) return false;

    return this.roleGraph.isAncestor(actorRole, this.roleGraph.roleOf(target));
  }

  /**
   * Whether `actor` is an instructor with a course relationship to `target`:
   * a student in one of their courses' assignments, or a TA on one of their
   * courses.
   */
  async isInstructorFor(actor: Subject, target: Subject): Promise<boolean> {
    if (this.roleGraph.roleOf(actor).kind !== RoleKind.INSTRUCTOR) return false;

    switch (this.roleGraph.roleOf(target).kind) {
      case RoleKind.STUDENT: {
        const courses = await this.membership.coursesInstructedBy(actor);
        return this.membership.participatesInAny(target, courses);
      }
      case RoleKind.TEACHING_ASSISTANT: {
        const [instructorCourses, taCourses] = await Promise.all([
          this.membership.coursesInstructedBy(actor),
          this.membership.coursesAssistedBy(target),
        ]);
        return this.membership.sharedCourseExists(instructorCourses, taCourses);
      }
      default:
        return false;
    }
  }

  async isTeachingAssistantFor(
    actor: Subject,
    target: Subject
  ): Promise<boolean> {
    if (this.roleGraph.roleOf(actor).kind !== RoleKind.TEACHING_ASSISTANT) {
      return false;
    }
    if (this.roleGraph.roleOf(target).kind !== RoleKind.STUDENT) return false;

    const courses = await this.membership.coursesAssistedBy(actor);
    return this.membership.participatesInAny(target, courses);
  }

  /**
   * The instructor a user works under: themselves for instructors and
   * above, the instructor of record of their first mapped course for a TA
   * (null when the TA has no course yet).
   */
  async instructorId(user: Subject): Promise<string | null> {
    const role = this.roleGraph.roleOf(user);

    switch (role.kind) {
      case RoleKind.INSTRUCTOR:
      case RoleKind.ADMINISTRATOR:
      case RoleKind.SUPER_ADMINISTRATOR:
        return user.id;
      case RoleKind.TEACHING_ASSISTANT: {
        const [firstCourse] = await this.membership.coursesAssistedBy(user);
        return firstCourse?.instructorId ?? null;
      }
      default:
        throw new UnsupportedRoleError(role.name);
    }
  }
}

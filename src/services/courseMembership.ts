import { Course, User } from "../types/entities";
import { RecordStore } from "./recordStore";

type MembershipStore = Pick<
  RecordStore,
  | "listCoursesByInstructor"
  | "listCoursesForTa"
  | "listAssignmentIdsForCourses"
  | "participantExists"
>;

/**
 * Course-level facts about users. Lookups for a user without the matching
 * role record come back empty; callers check roles first.
 */
export class CourseMembershipIndex {
  constructor(private readonly store: MembershipStore) {}

  async coursesInstructedBy(user: Pick<User, "id">): Promise<Course[]> {
    return this.store.listCoursesByInstructor(user.id);
  }

  async coursesAssistedBy(ta: Pick<User, "id">): Promise<Course[]> {
    return this.store.listCoursesForTa(ta.id);
  }

  async participatesIn(
    student: Pick<User, "id">,
    course: Pick<Course, "id">
  ): Promise<boolean> {
    return this.participatesInAny(student, [course]);
  }

  /** Whether the student participates in an assignment of any of the courses. */
  async participatesInAny(
    student: Pick<User, "id">,
    courses: Pick<Course, "id">[]
  ): Promise<boolean> {
    if (courses.length === 0) return false;

    const assignmentIds = await this.store.listAssignmentIdsForCourses(
      courses.map((course) => course.id)
    );
    if (assignmentIds.length === 0) return false;

    return this.store.participantExists(student.id, assignmentIds);
  }

  sharedCourseExists(
    coursesA: Pick<Course, "id">[],
    coursesB: Pick<Course, "id">[]
  ): boolean {
    const ids = new Set(coursesA.map((course) => course.id));
    return coursesB.some((course) => ids.has(course.id));
  }
}

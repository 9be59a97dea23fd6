import { AuthorizationEngine } from "../authorization";
import { CourseMembershipIndex } from "../courseMembership";
import { RoleGraph } from "../roleGraph";
import { UnsupportedRoleError } from "../../middleware/errorHandler";
import { InMemoryRecordStore } from "../../__tests__/helpers/inMemoryRecordStore";
import {
  ROLE_IDS,
  courseScenario,
  makeUser,
  standardRoles,
  users,
} from "../../__tests__/helpers/fixtures";

describe("AuthorizationEngine", () => {
  let store: InMemoryRecordStore;
  let engine: AuthorizationEngine;

  beforeEach(() => {
    store = new InMemoryRecordStore(courseScenario());
    engine = new AuthorizationEngine(
      RoleGraph.fromRecords(standardRoles),
      new CourseMembershipIndex(store)
    );
  });

  describe("isInstructorFor", () => {
    it("should be true for a student in one of the instructor's assignments", async () => {
      expect(await engine.isInstructorFor(users.instructor, users.student)).toBe(true);
    });

    it("should be true for a TA sharing a course", async () => {
      expect(await engine.isInstructorFor(users.instructor, users.ta)).toBe(true);
    });

    it("should be false for a student of another course", async () => {
      expect(
        await engine.isInstructorFor(users.instructor, users.unrelatedStudent)
      ).toBe(false);
    });

    it("should be false for a TA of another course", async () => {
      expect(await engine.isInstructorFor(users.instructor, users.otherTa)).toBe(false);
    });

    it("should be false when the target is neither student nor TA", async () => {
      expect(await engine.isInstructorFor(users.instructor, users.admin)).toBe(false);
      expect(
        await engine.isInstructorFor(users.instructor, users.otherInstructor)
      ).toBe(false);
    });

    it("should be false when the actor is not an instructor", async () => {
      expect(await engine.isInstructorFor(users.admin, users.student)).toBe(false);
      expect(await engine.isInstructorFor(users.ta, users.student)).toBe(false);
    });

    it("should be false for an instructor with no courses", async () => {
      const idle = makeUser({ id: "idle", roleId: ROLE_IDS.instructor });
      expect(await engine.isInstructorFor(idle, users.student)).toBe(false);
    });
  });

  describe("isTeachingAssistantFor", () => {
    it("should be true for a student in an assisted course", async () => {
      expect(await engine.isTeachingAssistantFor(users.ta, users.student)).toBe(true);
    });

    it("should be false for a student in another course", async () => {
      expect(
        await engine.isTeachingAssistantFor(users.ta, users.unrelatedStudent)
      ).toBe(false);
    });

    it("should be false when the target is not a student", async () => {
      expect(await engine.isTeachingAssistantFor(users.ta, users.otherTa)).toBe(false);
    });

    it("should be false when the actor is not a TA", async () => {
      expect(
        await engine.isTeachingAssistantFor(users.instructor, users.student)
      ).toBe(false);
    });
  });

  describe("canImpersonate", () => {
    it("should let a super-administrator impersonate anyone", async () => {
      for (const target of Object.values(users)) {
        expect(await engine.canImpersonate(users.superAdmin, target)).toBe(true);
      }
    });

    it("should let an instructor impersonate their student and TA", async () => {
      expect(await engine.canImpersonate(users.instructor, users.student)).toBe(true);
      expect(await engine.canImpersonate(users.instructor, users.ta)).toBe(true);
    });

    it("should stop an instructor at unrelated users even when the role chain would allow it", async () => {
      expect(
        await engine.canImpersonate(users.instructor, users.unrelatedStudent)
      ).toBe(false);
      expect(await engine.canImpersonate(users.instructor, users.otherTa)).toBe(false);
    });

    it("should let a TA impersonate their student", async () => {
      expect(await engine.canImpersonate(users.ta, users.student)).toBe(true);
    });

    it("should stop a TA at unrelated students even when the role chain would allow it", async () => {
      expect(await engine.canImpersonate(users.ta, users.unrelatedStudent)).toBe(false);
      expect(await engine.canImpersonate(users.unmappedTa, users.student)).toBe(false);
    });

    it("should let an administrator impersonate roles on their delegation chain", async () => {
      expect(await engine.canImpersonate(users.admin, users.student)).toBe(true);
      expect(await engine.canImpersonate(users.admin, users.ta)).toBe(true);
      expect(await engine.canImpersonate(users.admin, users.instructor)).toBe(true);
    });

    it("should not let an administrator impersonate a peer or a super-administrator", async () => {
      expect(await engine.canImpersonate(users.admin, users.otherAdmin)).toBe(false);
      expect(await engine.canImpersonate(users.admin, users.superAdmin)).toBe(false);
    });

    it("should not let a student impersonate anyone", async () => {
      expect(
        await engine.canImpersonate(users.student, users.unrelatedStudent)
      ).toBe(false);
      expect(await engine.canImpersonate(users.student, users.ta)).toBe(false);
    });

    it("should not consult course data for a super-administrator", async () => {
      const spy = jest.spyOn(store, "listCoursesByInstructor");
      await engine.canImpersonate(users.superAdmin, users.student);
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe("instructorId", () => {
    it("should return the user's own id for instructors and above", async () => {
      expect(await engine.instructorId(users.instructor)).toBe(users.instructor.id);
      expect(await engine.instructorId(users.admin)).toBe(users.admin.id);
      expect(await engine.instructorId(users.superAdmin)).toBe(users.superAdmin.id);
    });

    it("should return the supervising instructor for a TA", async () => {
      expect(await engine.instructorId(users.ta)).toBe(users.instructor.id);
      expect(await engine.instructorId(users.otherTa)).toBe(users.otherInstructor.id);
    });

    it("should return null for a TA without a course", async () => {
      expect(await engine.instructorId(users.unmappedTa)).toBeNull();
    });

    it("should throw for a student", async () => {
      await expect(engine.instructorId(users.student)).rejects.toThrow(
        UnsupportedRoleError
      );
      await expect(engine.instructorId(users.student)).rejects.toThrow(
        "Unknown role: Student"
      );
    });
  });
});

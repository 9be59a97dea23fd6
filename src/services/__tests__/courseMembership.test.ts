import { CourseMembershipIndex } from "../courseMembership";
import { InMemoryRecordStore } from "../../__tests__/helpers/inMemoryRecordStore";
import { courseScenario, users } from "../../__tests__/helpers/fixtures";

describe("CourseMembershipIndex", () => {
  let store: InMemoryRecordStore;
  let index: CourseMembershipIndex;

  beforeEach(() => {
    store = new InMemoryRecordStore(courseScenario());
    index = new CourseMembershipIndex(store);
  });

  it("should list the courses a user instructs", async () => {
    const courses = await index.coursesInstructedBy(users.instructor);
    expect(courses.map((course) => course.id)).toEqual(["course-1"]);
  });

  it("should return no instructed courses for a non-instructor", async () => {
    expect(await index.coursesInstructedBy(users.student)).toEqual([]);
  });

  it("should list the courses a TA assists", async () => {
    const courses = await index.coursesAssistedBy(users.otherTa);
    expect(courses.map((course) => course.id)).toEqual(["course-2"]);
  });

  it("should return no assisted courses for a user without mappings", async () => {
    expect(await index.coursesAssistedBy(users.instructor)).toEqual([]);
  });

  it("should report participation in a course's assignments", async () => {
    expect(await index.participatesIn(users.student, { id: "course-1" })).toBe(true);
    expect(await index.participatesIn(users.student, { id: "course-2" })).toBe(false);
  });

  it("should report no participation in a course without assignments", async () => {
    expect(await index.participatesIn(users.student, { id: "course-empty" })).toBe(false);
  });

  it("should check several courses at once", async () => {
    expect(
      await index.participatesInAny(users.unrelatedStudent, [
        { id: "course-1" },
        { id: "course-2" },
      ])
    ).toBe(true);
  });

  it("should not query the store for an empty course list", async () => {
    const spy = jest.spyOn(store, "listAssignmentIdsForCourses");
    expect(await index.participatesInAny(users.student, [])).toBe(false);
    expect(spy).not.toHaveBeenCalled();
  });

  describe("sharedCourseExists", () => {
    it("should detect an intersection by course id", () => {
      expect(
        index.sharedCourseExists([{ id: "a" }, { id: "b" }], [{ id: "c" }, { id: "b" }])
      ).toBe(true);
    });

    it("should be false for disjoint or empty sets", () => {
      expect(index.sharedCourseExists([{ id: "a" }], [{ id: "b" }])).toBe(false);
      expect(index.sharedCourseExists([], [{ id: "b" }])).toBe(false);
    });
  });
});

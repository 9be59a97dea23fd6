import { RoleRecord, User } from "../../types/entities";
import { StoreSeed } from "./inMemoryRecordStore";

export const ROLE_IDS = {
  student: "role-student",
  ta: "role-ta",
  instructor: "role-instructor",
  admin: "role-admin",
  superAdmin: "role-super-admin",
} as const;

// Each role's parent is the role that delegates authority to it
export const standardRoles: RoleRecord[] = [
  { id: ROLE_IDS.student, name: "Student", parentId: ROLE_IDS.ta },
  { id: ROLE_IDS.ta, name: "Teaching Assistant", parentId: ROLE_IDS.instructor },
  { id: ROLE_IDS.instructor, name: "Instructor", parentId: ROLE_IDS.admin },
  { id: ROLE_IDS.admin, name: "Administrator", parentId: ROLE_IDS.superAdmin },
  { id: ROLE_IDS.superAdmin, name: "Super-Administrator", parentId: null },
];

export const makeUser = (overrides: Partial<User> & Pick<User, "id">): User => ({
  name: overrides.id.replace(/[^a-z]/g, ""),
  fullName: `User ${overrides.id}`,
  email: `${overrides.id}@example.com`,
  passwordDigest: null,
  roleId: ROLE_IDS.student,
  institutionId: null,
  parentId: null,
  copyOfEmails: false,
  emailOnReview: false,
  emailOnSubmission: false,
  emailOnReviewOfReview: false,
  etcIconsOnHomepage: true,
  isNewUser: false,
  ...overrides,
});

export const users = {
  superAdmin: makeUser({ id: "superadmin", roleId: ROLE_IDS.superAdmin }),
  admin: makeUser({ id: "admin", roleId: ROLE_IDS.admin }),
  otherAdmin: makeUser({ id: "otheradmin", roleId: ROLE_IDS.admin }),
  instructor: makeUser({ id: "instructor", roleId: ROLE_IDS.instructor }),
  otherInstructor: makeUser({ id: "otherinstructor", roleId: ROLE_IDS.instructor }),
  ta: makeUser({ id: "ta", roleId: ROLE_IDS.ta }),
  otherTa: makeUser({ id: "otherta", roleId: ROLE_IDS.ta }),
  unmappedTa: makeUser({ id: "unmappedta", roleId: ROLE_IDS.ta }),
  student: makeUser({ id: "student", roleId: ROLE_IDS.student }),
  unrelatedStudent: makeUser({ id: "unrelatedstudent", roleId: ROLE_IDS.student }),
};

/**
 * instructor teaches course-1 (TA: ta, student participates in assignment-1);
 * otherInstructor teaches course-2 (TA: otherTa, unrelatedStudent participates).
 */
export const courseScenario = (): StoreSeed => ({
  roles: standardRoles,
  users: Object.values(users),
  courses: [
    { id: "course-1", name: "Algorithms", instructorId: users.instructor.id, institutionId: null },
    { id: "course-2", name: "Compilers", instructorId: users.otherInstructor.id, institutionId: null },
  ],
  taMappings: [
    { taId: users.ta.id, courseId: "course-1" },
    { taId: users.otherTa.id, courseId: "course-2" },
  ],
  assignments: [
    { id: "assignment-1", courseId: "course-1", name: "Sorting" },
    { id: "assignment-2", courseId: "course-2", name: "Parsing" },
  ],
  participants: [
    { id: "participant-1", assignmentId: "assignment-1", userId: users.student.id },
    { id: "participant-2", assignmentId: "assignment-2", userId: users.unrelatedStudent.id },
  ],
});

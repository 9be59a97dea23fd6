// Role kinds, ordered from least to most privileged
export enum RoleKind {
  STUDENT = "student",
  TEACHING_ASSISTANT = "teaching_assistant",
  INSTRUCTOR = "instructor",
  ADMINISTRATOR = "administrator",
  SUPER_ADMINISTRATOR = "super_administrator",
}

import { RoleKind } from "./enums";

// Rank of each role kind; higher outranks lower
export const ROLE_RANK: Readonly<Record<RoleKind, number>> = {
  [RoleKind.STUDENT]: 0,
  [RoleKind.TEACHING_ASSISTANT]: 1,
  [RoleKind.INSTRUCTOR]: 2,
  [RoleKind.ADMINISTRATOR]: 3,
  [RoleKind.SUPER_ADMINISTRATOR]: 4,
};

// Names roles are stored under in the roles table
export const ROLE_NAMES: Readonly<Record<RoleKind, string>> = {
  [RoleKind.STUDENT]: "Student",
  [RoleKind.TEACHING_ASSISTANT]: "Teaching Assistant",
  [RoleKind.INSTRUCTOR]: "Instructor",
  [RoleKind.ADMINISTRATOR]: "Administrator",
  [RoleKind.SUPER_ADMINISTRATOR]: "Super-Administrator",
};

export const ROLE_KIND_BY_NAME: ReadonlyMap<string, RoleKind> = new Map(
  Object.values(RoleKind).map((kind) => [ROLE_NAMES[kind], kind] as const)
);

// User search bounds: scan at most SCAN_LIMIT matches, return at most RESULT_LIMIT
export const USER_SEARCH = {
  SCAN_LIMIT: 20,
  RESULT_LIMIT: 10,
} as const;

export const TEMPORARY_PASSWORD_LENGTH = 10;

export const USER_FIELD_LIMITS = {
  PASSWORD_MIN_LENGTH: 6,
  FULL_NAME_MAX_LENGTH: 50,
} as const;

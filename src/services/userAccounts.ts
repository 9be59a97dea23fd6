import { randomUUID } from "crypto";
import { z } from "zod";
import { USER_FIELD_LIMITS } from "../types/constants";
import { User } from "../types/entities";
import { PasswordResetResult, RegisterUserRequest } from "../types/api";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../middleware/errorHandler";
import { logger } from "../utils/logger";
import { PasswordService, passwordService } from "./passwordService";
import { RecordStore } from "./recordStore";
import { RoleGraph } from "./roleGraph";

export const registerUserSchema = z.object({
  name: z
    .string({ required_error: "can't be blank" })
    .min(1, "can't be blank")
    .regex(/^[a-z]+$/, "must be in lowercase"),
  email: z
    .string({ required_error: "can't be blank" })
    .email("is invalid"),
  password: z
    .string()
    .min(
      USER_FIELD_LIMITS.PASSWORD_MIN_LENGTH,
      `is too short (minimum is ${USER_FIELD_LIMITS.PASSWORD_MIN_LENGTH} characters)`
    )
    .optional(),
  fullName: z
    .string({ required_error: "can't be blank" })
    .trim()
    .min(1, "can't be blank")
    .max(
      USER_FIELD_LIMITS.FULL_NAME_MAX_LENGTH,
      `is too long (maximum is ${USER_FIELD_LIMITS.FULL_NAME_MAX_LENGTH} characters)`
    ),
});

/**
 * Field defaults applied when a user record is first built. Preference
 * flags default to off; homepage icons are always on for a new account.
 */
export function buildNewUser(
  id: string,
  input: RegisterUserRequest,
  passwordDigest: string | null
): User {
  return {
    id,
    name: input.name,
    fullName: input.fullName,
    email: input.email,
    passwordDigest,
    roleId: input.roleId,
    institutionId: input.institutionId ?? null,
    parentId: input.parentId ?? null,
    isNewUser: true,
    copyOfEmails: input.copyOfEmails ?? false,
    emailOnReview: input.emailOnReview ?? false,
    emailOnSubmission: input.emailOnSubmission ?? false,
    emailOnReviewOfReview: input.emailOnReviewOfReview ?? false,
    etcIconsOnHomepage: true,
  };
}

type AccountStore = Pick<
  RecordStore,
  | "findUserById"
  | "findUsersByName"
  | "detachChildUsers"
  | "insertUser"
  | "updateUser"
  | "deleteUser"
>;

/**
 * Account lifecycle: registration, credentials and removal.
 */
export class UserAccountService {
  constructor(
    private readonly store: AccountStore,
    private readonly roleGraph: RoleGraph,
    private readonly passwords: PasswordService = passwordService,
    private readonly generateId: () => string = randomUUID
  ) {}

  /** Returns the input with validated fields normalized (full name trimmed). */
  validate(input: RegisterUserRequest): RegisterUserRequest {
    const result = registerUserSchema.safeParse(input);
    if (!result.success) {
      const messages = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      );
      throw new ValidationError(messages.join(", "));
    }
    return { ...input, ...result.data };
  }

  async register(request: RegisterUserRequest): Promise<User> {
    const input = this.validate(request);

    if (!this.roleGraph.hasRole(input.roleId)) {
      throw new ValidationError(`roleId: unknown role ${input.roleId}`);
    }

    const existing = await this.store.findUsersByName(input.name);
    if (existing.length > 0) {
      throw new ConflictError(`Name ${input.name} has already been taken`);
    }

    const digest = input.password ? await this.passwords.hash(input.password) : null;
    const user = await this.store.insertUser(
      buildNewUser(this.generateId(), input, digest)
    );

    logger.info("User registered", { userId: user.id, roleId: user.roleId });
    return user;
  }

  async verifyPassword(
    user: Pick<User, "passwordDigest">,
    password: string
  ): Promise<boolean> {
    if (!user.passwordDigest) return false;
    return this.passwords.verify(password, user.passwordDigest);
  }

  /** Replace the user's password with a random one and return it for delivery. */
  async resetPassword(userId: string): Promise<PasswordResetResult> {
    const temporaryPassword = this.passwords.generateTemporaryPassword();
    const passwordDigest = await this.passwords.hash(temporaryPassword);

    const updated = await this.store.updateUser(userId, { passwordDigest });
    if (!updated) {
      throw new NotFoundError(`User ${userId}`);
    }

    logger.info("Password reset", { userId });
    return { userId, temporaryPassword };
  }

  /** Delete a user; accounts they created are kept and detached. */
  async deleteUser(userId: string): Promise<void> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId}`);
    }

    const detachedChildren = await this.store.detachChildUsers(userId);
    await this.store.deleteUser(userId);

    logger.info("User deleted", { userId, detachedChildren });
  }
}

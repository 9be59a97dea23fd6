import { USER_SEARCH } from "../types/constants";
import { RoleKind, User } from "../types/entities";
import { UserLookupParams } from "../types/api";
import { NotFoundError } from "../middleware/errorHandler";
import { RecordStore } from "./recordStore";
import { RoleGraph } from "./roleGraph";

type DirectoryStore = Pick<
  RecordStore,
  | "findUserById"
  | "findUserByEmail"
  | "findUsersByName"
  | "findUsersByFullNameSubstring"
  | "findUsersByRoleIds"
>;

export class UserDirectory {
  constructor(
    private readonly store: DirectoryStore,
    private readonly roleGraph: RoleGraph
  ) {}

  /**
   * Resolve a login that is either an email address or a user name.
   * A name only resolves when exactly one user carries it.
   */
  async resolveLogin(login: string): Promise<User | null> {
    const byEmail = await this.store.findUserByEmail(login);
    if (byEmail) return byEmail;

    const [shortName] = login.split("@");
    const matches = await this.store.findUsersByName(shortName);
    return matches.length === 1 ? matches[0] : null;
  }

  /**
   * Users whose full name contains `name`, limited to roles the requester
   * outranks or shares. Only the first SCAN_LIMIT matches are considered.
   */
  async searchVisibleByName(
    requester: Pick<User, "roleId">,
    name: string
  ): Promise<User[]> {
    const visibleRoleIds = new Set(
      this.roleGraph
        .subordinateRolesAndSelf(this.roleGraph.roleOf(requester))
        .map((role) => role.id)
    );

    const candidates = await this.store.findUsersByFullNameSubstring(
      name,
      USER_SEARCH.SCAN_LIMIT
    );

    return candidates
      .filter((user) => visibleRoleIds.has(user.roleId))
      .slice(0, USER_SEARCH.RESULT_LIMIT);
  }

  async findByIdOrName(params: UserLookupParams): Promise<User> {
    let user: User | null = null;

    if (params.userId) {
      user = await this.store.findUserById(params.userId);
    } else if (params.name) {
      const [first] = await this.store.findUsersByName(params.name);
      user = first ?? null;
    }

    if (!user) {
      throw new NotFoundError(`User ${params.userId || params.name || ""}`.trim());
    }
    return user;
  }

  async listByRole(kind: RoleKind): Promise<User[]> {
    const roleIds = this.roleGraph
      .roles()
      .filter((role) => role.kind === kind)
      .map((role) => role.id);
    if (roleIds.length === 0) return [];

    return this.store.findUsersByRoleIds(roleIds);
  }
}

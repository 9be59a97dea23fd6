import { ROLE_KIND_BY_NAME, ROLE_RANK } from "../types/constants";
import { Role, RoleKind, RoleRecord, User } from "../types/entities";
import { RoleGraphIntegrityError } from "../middleware/errorHandler";
import { RecordStore } from "./recordStore";

/**
 * Immutable view of the role reference data.
 *
 * Two orderings live here and must not be confused: `rank` is the fixed
 * privilege order of role kinds, while the parent pointers form delegation
 * chains that `isAncestor` walks.
 */
export class RoleGraph {
  private readonly byId: ReadonlyMap<string, Role>;

  private constructor(roles: Role[]) {
    this.byId = new Map(roles.map((role) => [role.id, role] as const));
  }

  /**
   * Build a graph from stored role rows. Rejects unknown role names,
   * duplicate ids, dangling parent ids and parent cycles.
   */
  static fromRecords(records: RoleRecord[]): RoleGraph {
    const roles: Role[] = [];
    const ids = new Set<string>();

    for (const record of records) {
      const kind = ROLE_KIND_BY_NAME.get(record.name);
      if (!kind) {
        throw new RoleGraphIntegrityError(
          `Role ${record.id} has unknown name "${record.name}"`
        );
      }
      if (ids.has(record.id)) {
        throw new RoleGraphIntegrityError(`Duplicate role id ${record.id}`);
      }
      ids.add(record.id);
      roles.push({ ...record, kind });
    }

    for (const role of roles) {
      if (role.parentId !== null && !ids.has(role.parentId)) {
        throw new RoleGraphIntegrityError(
          `Role ${role.id} references missing parent ${role.parentId}`
        );
      }
    }

    const graph = new RoleGraph(roles);
    for (const role of roles) {
      graph.assertAcyclicFrom(role);
    }
    return graph;
  }

  static async load(store: Pick<RecordStore, "listRoles">): Promise<RoleGraph> {
    return RoleGraph.fromRecords(await store.listRoles());
  }

  roles(): Role[] {
    return Array.from(this.byId.values());
  }

  getRole(id: string): Role {
    const role = this.byId.get(id);
    if (!role) {
      throw new RoleGraphIntegrityError(`Unknown role id ${id}`);
    }
    return role;
  }

  hasRole(id: string): boolean {
    return this.byId.has(id);
  }

  roleOf(user: Pick<User, "roleId">): Role {
    return this.getRole(user.roleId);
  }

  findByKind(kind: RoleKind): Role | null {
    return this.roles().find((role) => role.kind === kind) ?? null;
  }

  parentOf(role: Role): Role | null {
    return role.parentId === null ? null : this.getRole(role.parentId);
  }

  rank(role: Role): number {
    return ROLE_RANK[role.kind];
  }

  /** Every role whose rank is at or below `role`'s, including `role`. */
  subordinateRolesAndSelf(role: Role): Role[] {
    const ceiling = this.rank(role);
    return this.roles().filter((candidate) => this.rank(candidate) <= ceiling);
  }

  /**
   * Whether `candidateParent` appears on `role`'s parent chain. A
   * super-administrator on the chain ends the walk: authority is not
   * inherited through it.
   */
  isAncestor(candidateParent: Role, role: Role): boolean {
    const visited = new Set<string>([role.id]);
    let parent = this.parentOf(role);

    while (parent) {
      if (parent.id === candidateParent.id) return true;
      if (parent.kind === RoleKind.SUPER_ADMINISTRATOR) return false;
      if (visited.has(parent.id)) {
        throw new RoleGraphIntegrityError(
          `Role parent chain of ${role.id} revisits ${parent.id}`
        );
      }
      visited.add(parent.id);
      parent = this.parentOf(parent);
    }

    return false;
  }

  private assertAcyclicFrom(role: Role): void {
    const visited = new Set<string>();
    let current: Role | null = role;

    while (current) {
      if (visited.has(current.id)) {
        throw new RoleGraphIntegrityError(
          `Role parent chain of ${role.id} forms a cycle at ${current.id}`
        );
      }
      visited.add(current.id);
      current = this.parentOf(current);
    }
  }
}

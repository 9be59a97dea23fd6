import { AuthorizationEngine } from "./services/authorization";
import { CourseMembershipIndex } from "./services/courseMembership";
import { RecordStore } from "./services/recordStore";
import { RoleGraph } from "./services/roleGraph";
import { SupabaseRecordStore } from "./services/supabaseRecordStore";
import { UserAccountService } from "./services/userAccounts";
import { UserDirectory } from "./services/userDirectory";

export * from "./types/entities";
export * from "./types/api";
export * from "./types/constants";
export * from "./middleware/errorHandler";
export { requireImpersonation } from "./middleware/impersonation";
export { logger, Logger } from "./utils/logger";
export { config } from "./config";
export { RoleGraph } from "./services/roleGraph";
export { CourseMembershipIndex } from "./services/courseMembership";
export { AuthorizationEngine } from "./services/authorization";
export { UserDirectory } from "./services/userDirectory";
export { UserAccountService, registerUserSchema, buildNewUser } from "./services/userAccounts";
export { PasswordService, passwordService } from "./services/passwordService";
export { SupabaseRecordStore } from "./services/supabaseRecordStore";
export type { RecordStore, UserPatch } from "./services/recordStore";

export interface AuthorizationContext {
  store: RecordStore;
  roleGraph: RoleGraph;
  membership: CourseMembershipIndex;
  engine: AuthorizationEngine;
  directory: UserDirectory;
  accounts: UserAccountService;
}

/**
 * Wire the services over a record store. Loads the role graph once; call
 * again after role reference data changes.
 */
export async function createAuthorizationContext(
  store: RecordStore = new SupabaseRecordStore()
): Promise<AuthorizationContext> {
  const roleGraph = await RoleGraph.load(store);
  const membership = new CourseMembershipIndex(store);

  return {
    store,
    roleGraph,
    membership,
    engine: new AuthorizationEngine(roleGraph, membership),
    directory: new UserDirectory(store, roleGraph),
    accounts: new UserAccountService(store, roleGraph),
  };
}

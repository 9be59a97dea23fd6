import { Request, Response, NextFunction, RequestHandler } from "express";
import { AuthorizationEngine } from "../services/authorization";
import { RecordStore } from "../services/recordStore";
import { logger } from "../utils/logger";
import {
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  asyncHandler,
} from "./errorHandler";
import "../types/express";

/**
 * Middleware to require that the authenticated user may impersonate the
 * user named by a route parameter
 */
export const requireImpersonation = (
  engine: AuthorizationEngine,
  store: Pick<RecordStore, "findUserById">,
  targetParam: string = "userId"
): RequestHandler => {
  return asyncHandler(
    async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
      const actor = req.user;
      if (!actor) {
        throw new AuthenticationError();
      }

      const targetId = req.params[targetParam];
      const target = targetId ? await store.findUserById(targetId) : null;
      if (!target) {
        throw new NotFoundError("User");
      }

      if (!(await engine.canImpersonate(actor, target))) {
        logger.warn("Impersonation denied", {
          actorId: actor.id,
          targetId: target.id,
          path: req.path,
        });
        throw new AuthorizationError(`Cannot impersonate user ${target.id}`);
      }

      next();
    }
  );
};

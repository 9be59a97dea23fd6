import { User } from "./entities";

// The session layer places the authenticated user on the request
declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export {};

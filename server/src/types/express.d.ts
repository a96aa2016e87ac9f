import type { TempWorkspace } from "../utils/temp-workspace";

declare global {
  namespace Express {
    interface Request {
      workspace?: TempWorkspace;
      requestId?: string;
    }
  }
}

export {};

// src/types/express/index.d.ts
import type { AuthUser } from "../../services/auth.service";

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
      /** exact bytes of the JSON body, kept for webhook signatures */
      rawBody?: Buffer;
    }
  }
}

export {};

import type { AuthProof } from "../domain/ports.js";

declare global {
  namespace Express {
    interface Request {
      proof?: AuthProof;
    }
  }
}

export {};

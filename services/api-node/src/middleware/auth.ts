import type { NextFunction, Request, Response } from "express";
import type { AuthProof } from "../domain/ports.js";
import { authorizer } from "../domain/index.js";
import { HttpError } from "../utils/errors.js";

export function bearerToken(request: Request): string {
  const header = request.headers.authorization;
  return header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
}

export function requireAuth(request: Request, response: Response, next: NextFunction): void {
  const token = bearerToken(request);
  if (!token) {
    response.status(401).json({
      error: {
        code: "UNAUTHORIZED",
        message: "Missing Bearer token.",
      },
    });
    return;
  }
  const proof = authorizer.parseToken(token);
  if (!proof) {
    response.status(401).json({
      error: {
        code: "UNAUTHORIZED",
        message: "Bearer token is not valid.",
      },
    });
    return;
  }
  request.proof = proof;
  next();
}

export function proofOf(request: Request): AuthProof {
  if (!request.proof) {
    throw new HttpError(401, "UNAUTHORIZED", "Authentication is required.");
  }
  return request.proof;
}

/** Proof for a second signer carried in the request body, e.g. a swap counterparty. */
export function counterpartyProof(token: string): AuthProof {
  const proof = authorizer.parseToken(token);
  if (!proof) {
    throw new HttpError(401, "UNAUTHORIZED", "Counterparty token is not valid.");
  }
  return proof;
}

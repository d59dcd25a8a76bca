import type { Address } from "@roscaflow/shared";
import type { AuthProof, Authorizer } from "../domain/ports.js";
import { safeEqual, signValue } from "../utils/crypto.js";

/**
 * Bearer tokens of the form `<address>.<hmac-sha256(address)>`. Addresses may
 * contain dots; the signature is everything after the last one.
 */
export class HmacAuthorizer implements Authorizer {
  constructor(private readonly secret: string) {}

  issueToken(principal: Address): string {
    return `${principal}.${signValue(principal, this.secret)}`;
  }

  proofFor(principal: Address): AuthProof {
    return { principal, token: this.issueToken(principal) };
  }

  parseToken(token: string): AuthProof | null {
    const separator = token.lastIndexOf(".");
    if (separator <= 0) {
      return null;
    }
    const proof = { principal: token.slice(0, separator), token };
    return this.verify(proof) ? proof : null;
  }

  verify(proof: AuthProof): boolean {
    const expected = this.issueToken(proof.principal);
    return safeEqual(expected, proof.token);
  }
}

import { env } from "../config/env.js";
import { MemoryAssetLedger } from "../providers/assetProvider.js";
import { HmacAuthorizer } from "../providers/authProvider.js";
import { SystemClock } from "../providers/clockProvider.js";
import { AuditTrailSink } from "../providers/eventProvider.js";
import { CryptoShuffler } from "../providers/shuffleProvider.js";
import { CircleEngine } from "./engine.js";

export const authorizer = new HmacAuthorizer(env.AUTH_SECRET);
export const assetLedger = new MemoryAssetLedger();
export const auditTrail = new AuditTrailSink();

export const engine = new CircleEngine(
  {
    authorizer,
    assets: assetLedger,
    clock: new SystemClock(),
    shuffler: new CryptoShuffler(),
    events: auditTrail,
  },
  {
    custodyAddress: env.CUSTODY_ADDRESS,
    defaultCycleDuration: env.DEFAULT_CYCLE_DURATION_SECS,
  }
);

export function resetEngineForTests(): void {
  engine.resetStateForTests();
  assetLedger.reset();
  auditTrail.clear();
}

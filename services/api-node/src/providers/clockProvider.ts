import type { Clock } from "../domain/ports.js";
import { unixSeconds } from "../utils/time.js";

export class SystemClock implements Clock {
  now(): number {
    return unixSeconds();
  }
}

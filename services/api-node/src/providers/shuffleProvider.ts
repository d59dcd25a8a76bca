import type { Shuffler } from "../domain/ports.js";
import { randomIndex } from "../utils/crypto.js";

/** Fisher-Yates over a CSPRNG. Returns a new array. */
export class CryptoShuffler implements Shuffler {
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = randomIndex(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}

import type { AuditEntry, EventPayloads, EventTopic } from "@roscaflow/shared";
import type { Checkpointable, EventSink, Restore } from "../domain/ports.js";
import { hashValue, uid } from "../utils/crypto.js";
import { nowIso } from "../utils/time.js";

/**
 * Append-only, hash-chained event log. Each entry commits to its predecessor's
 * hash so a truncated or edited history is detectable with `verifyChain()`.
 */
export class AuditTrailSink implements EventSink, Checkpointable {
  private entries: AuditEntry[] = [];

  publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]): void {
    const previousHash = this.entries.at(-1)?.entryHash ?? "GENESIS";
    const timestamp = nowIso();
    const event: EventPayloads[EventTopic] = payload;
    const circleId = "circleId" in event ? event.circleId : null;
    const entryHash = hashValue(`${previousHash}|${timestamp}|${topic}|${JSON.stringify(event)}`);
    this.entries.push({
      id: uid("evt"),
      topic,
      circleId,
      payload: event,
      timestamp,
      previousHash,
      entryHash,
    });
  }

  list(filters: { circleId?: number; topic?: EventTopic; limit?: number } = {}): AuditEntry[] {
    const matching = this.entries.filter((entry) => {
      if (filters.circleId !== undefined && entry.circleId !== filters.circleId) {
        return false;
      }
      if (filters.topic && entry.topic !== filters.topic) {
        return false;
      }
      return true;
    });
    return filters.limit ? matching.slice(-filters.limit) : matching;
  }

  verifyChain(): boolean {
    return this.entries.every((entry, index) => {
      const previousHash = index === 0 ? "GENESIS" : this.entries[index - 1].entryHash;
      const expected = hashValue(`${previousHash}|${entry.timestamp}|${entry.topic}|${JSON.stringify(entry.payload)}`);
      return entry.previousHash === previousHash && entry.entryHash === expected;
    });
  }

  checkpoint(): Restore {
    const length = this.entries.length;
    return () => {
      this.entries = this.entries.slice(0, length);
    };
  }

  clear(): void {
    this.entries = [];
  }
}

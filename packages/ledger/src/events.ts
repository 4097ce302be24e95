import type { LedgerEvent } from "@blockstake/types";
import { LedgerInvariantError } from "./errors";

/** Destination for audit events. Appends happen in emission order. */
export interface EventLog {
  append(event: LedgerEvent): void;
}

export class MemoryEventLog implements EventLog {
  readonly events: LedgerEvent[] = [];

  append(event: LedgerEvent): void {
    this.events.push(event);
  }

  ofType<T extends LedgerEvent["type"]>(type: T): Extract<LedgerEvent, { type: T }>[] {
    return this.events.filter(
      (e): e is Extract<LedgerEvent, { type: T }> => e.type === type
    );
  }
}

/** Distributes on a single type parameter so each variant keeps its own fields. */
export type EventPayload<E extends LedgerEvent = LedgerEvent> =
  E extends LedgerEvent ? Omit<E, "sequence" | "blockHeight"> : never;

/** Stamps events with a sequence number before handing them to the log. */
export class EventRecorder {
  private sequence = 0;

  constructor(private readonly log: EventLog) {}

  emit(payload: EventPayload, blockHeight: bigint): void {
    this.sequence += 1;
    const event: LedgerEvent = { ...payload, sequence: this.sequence, blockHeight };
    this.log.append(event);
  }

  /** Continue numbering after a replayed event. Sequences must increase. */
  resume(sequence: number): void {
    if (sequence <= this.sequence) {
      throw new LedgerInvariantError(`event #${sequence} is out of order after #${this.sequence}`);
    }
    this.sequence = sequence;
  }
}

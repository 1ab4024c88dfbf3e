/**
 * Failover Event Journal
 *
 * Durable record of failover events. The executor saves after every step
 * so a restarted controller can resume a live event where it stopped.
 *
 * Rules shared by every implementation:
 * - at most one live (non-terminal) event per service
 * - a terminal event is immutable; re-saving it unchanged is a no-op
 */

import { ControllerError, ErrorCode } from '@regionguard/core';
import { isTerminalPhase } from '@regionguard/types';
import type { FailoverEvent, ServiceId } from '@regionguard/types';
import { FailoverEventSchema } from './event-schema';

export interface FailoverEventJournal {
  save(event: FailoverEvent): Promise<void>;
  get(eventId: string): Promise<FailoverEvent | null>;
  getLive(serviceId: ServiceId): Promise<FailoverEvent | null>;
  /** Newest first */
  list(serviceId: ServiceId, limit?: number): Promise<FailoverEvent[]>;
}

/**
 * Stable serialization for equality checks; key order follows the schema.
 */
function canonical(event: FailoverEvent): string {
  return JSON.stringify(FailoverEventSchema.parse(event));
}

export function cloneEvent(event: FailoverEvent): FailoverEvent {
  return { ...event, steps: event.steps.map(step => ({ ...step })) };
}

/**
 * Check a save against what is already stored. Returns false when the
 * save is a no-op.
 */
export function checkSave(existing: FailoverEvent | null, next: FailoverEvent, liveId: string | null): boolean {
  if (existing && isTerminalPhase(existing.phase)) {
    if (canonical(existing) === canonical(next)) {
      return false;
    }
    throw new ControllerError(
      `Failover event ${next.id} is ${existing.phase} and can no longer change`,
      ErrorCode.JOURNAL_ERROR,
      { context: { eventId: next.id, phase: existing.phase } }
    );
  }

  if (!isTerminalPhase(next.phase) && liveId !== null && liveId !== next.id) {
    throw new ControllerError(
      `Service ${next.serviceId} already has live failover ${liveId}`,
      ErrorCode.FAILOVER_ALREADY_LIVE,
      { context: { serviceId: next.serviceId, liveEventId: liveId, eventId: next.id } }
    );
  }
  return true;
}

export class InMemoryFailoverJournal implements FailoverEventJournal {
  private readonly events = new Map<string, FailoverEvent>();
  private readonly live = new Map<ServiceId, string>();
  private readonly history = new Map<ServiceId, string[]>();

  async save(event: FailoverEvent): Promise<void> {
    const existing = this.events.get(event.id) ?? null;
    if (!checkSave(existing, event, this.live.get(event.serviceId) ?? null)) {
      return;
    }

    this.events.set(event.id, cloneEvent(event));
    if (!existing) {
      const ids = this.history.get(event.serviceId) ?? [];
      ids.unshift(event.id);
      this.history.set(event.serviceId, ids);
    }

    if (isTerminalPhase(event.phase)) {
      if (this.live.get(event.serviceId) === event.id) {
        this.live.delete(event.serviceId);
      }
    } else {
      this.live.set(event.serviceId, event.id);
    }
  }

  async get(eventId: string): Promise<FailoverEvent | null> {
    const event = this.events.get(eventId);
    return event ? cloneEvent(event) : null;
  }

  async getLive(serviceId: ServiceId): Promise<FailoverEvent | null> {
    const id = this.live.get(serviceId);
    return id ? this.get(id) : null;
  }

  async list(serviceId: ServiceId, limit = 50): Promise<FailoverEvent[]> {
    const ids = (this.history.get(serviceId) ?? []).slice(0, limit);
    const events: FailoverEvent[] = [];
    for (const id of ids) {
      const event = this.events.get(id);
      if (event) events.push(cloneEvent(event));
    }
    return events;
  }
}

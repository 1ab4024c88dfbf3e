/**
 * Redis-backed failover journal (ioredis).
 *
 * Key layout (see JournalKeys):
 * - event:<id>          JSON of the event
 * - live:<serviceId>    id of the live event, absent when none
 * - history:<serviceId> list of event ids, newest first, capped
 */

import { ControllerError, ErrorCode, createLogger, getErrorMessage } from '@regionguard/core';
import type { ServiceLogger } from '@regionguard/core';
import { JournalKeys, isTerminalPhase } from '@regionguard/types';
import type { FailoverEvent, ServiceId } from '@regionguard/types';
import { FailoverEventSchema } from './event-schema';
import { checkSave } from './failover-journal';
import type { FailoverEventJournal } from './failover-journal';

/**
 * The subset of the ioredis client the journal uses.
 */
export interface JournalRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  lpush(key: string, value: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
}

export interface RedisFailoverJournalOptions {
  logger?: ServiceLogger;
  historyLimit?: number;
}

export class RedisFailoverJournal implements FailoverEventJournal {
  private readonly logger: ServiceLogger;
  private readonly historyLimit: number;

  constructor(private readonly redis: JournalRedisClient, options: RedisFailoverJournalOptions = {}) {
    this.logger = options.logger ?? createLogger('failover-journal:redis');
    this.historyLimit = options.historyLimit ?? 200;
  }

  async save(event: FailoverEvent): Promise<void> {
    const existing = await this.get(event.id);
    const liveId = await this.redis.get(JournalKeys.live(event.serviceId));
    if (!checkSave(existing, event, liveId)) {
      return;
    }

    await this.redis.set(JournalKeys.event(event.id), JSON.stringify(event));

    if (!existing) {
      await this.redis.lpush(JournalKeys.history(event.serviceId), event.id);
      await this.redis.ltrim(JournalKeys.history(event.serviceId), 0, this.historyLimit - 1);
    }

    if (isTerminalPhase(event.phase)) {
      if (liveId === event.id) {
        await this.redis.del(JournalKeys.live(event.serviceId));
      }
    } else if (liveId !== event.id) {
      await this.redis.set(JournalKeys.live(event.serviceId), event.id);
    }
  }

  async get(eventId: string): Promise<FailoverEvent | null> {
    const raw = await this.redis.get(JournalKeys.event(eventId));
    return raw === null ? null : this.decode(eventId, raw);
  }

  async getLive(serviceId: ServiceId): Promise<FailoverEvent | null> {
    const id = await this.redis.get(JournalKeys.live(serviceId));
    return id === null ? null : this.get(id);
  }

  async list(serviceId: ServiceId, limit = 50): Promise<FailoverEvent[]> {
    const ids = await this.redis.lrange(JournalKeys.history(serviceId), 0, limit - 1);
    const events: FailoverEvent[] = [];
    for (const id of ids) {
      const event = await this.get(id);
      if (event) events.push(event);
    }
    return events;
  }

  private decode(eventId: string, raw: string): FailoverEvent {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.error('Corrupt failover event in journal', { eventId, error: getErrorMessage(error) });
      throw new ControllerError(`Failover event ${eventId} could not be decoded`, ErrorCode.JOURNAL_ERROR, {
        context: { eventId }
      });
    }

    const parsed = FailoverEventSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.error('Failover event in journal has an unexpected shape', { eventId, issues: parsed.error.issues.length });
      throw new ControllerError(`Failover event ${eventId} could not be decoded`, ErrorCode.JOURNAL_ERROR, {
        context: { eventId }
      });
    }
    return parsed.data;
  }
}

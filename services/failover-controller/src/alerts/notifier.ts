/**
 * Controller Event Notifier
 *
 * Fans structured controller events out to notification channels and to
 * in-process listeners. Emitting never blocks or throws: channel sends
 * run in the background and their failures are only logged.
 *
 * Environment Variables:
 * - NOTIFY_WEBHOOK_URL: webhook receiving JSON-encoded events
 */

import { EventEmitter } from 'events';
import {
  CircuitBreaker,
  CircuitBreakerError,
  createLogger,
  getErrorMessage,
  withTimeout
} from '@regionguard/core';
import type { CircuitBreakerConfig, ServiceLogger } from '@regionguard/core';
import type { ControllerEvent, ControllerEventType } from '@regionguard/types';

/**
 * Anything that accepts controller events. Components depend on this,
 * not on Notifier, so tests can capture events directly.
 */
export interface ControllerEventSink {
  emit(event: ControllerEvent): void;
}

/**
 * Notification channel interface.
 */
export interface NotificationChannel {
  name: string;
  send(event: ControllerEvent): Promise<boolean>;
  isConfigured(): boolean;
}

/**
 * Writes every event as one structured log line.
 */
export class LogChannel implements NotificationChannel {
  readonly name = 'log';

  constructor(private readonly logger: ServiceLogger) {}

  isConfigured(): boolean {
    return true;
  }

  async send(event: ControllerEvent): Promise<boolean> {
    const meta = { ...describeEvent(event), serviceId: event.serviceId, type: event.type };

    if (event.type === 'escalation') {
      const log = event.severity === 'critical' ? this.logger.error : this.logger.warn;
      log.call(this.logger, `Escalation: ${event.message}`, { ...meta, details: event.details });
    } else {
      this.logger.info(`Controller event ${event.type}`, meta);
    }
    return true;
  }
}

const DEFAULT_WEBHOOK_EVENT_TYPES: readonly ControllerEventType[] = [
  'coordinator_state_changed',
  'failover_phase_changed',
  'escalation',
  'override_applied'
];

const DEFAULT_WEBHOOK_CIRCUIT: Omit<CircuitBreakerConfig, 'name'> = {
  failureThreshold: 5,
  recoveryTimeout: 60_000,
  monitoringPeriod: 60_000,
  successThreshold: 1
};

export interface WebhookChannelOptions {
  logger?: ServiceLogger;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  /** Event types forwarded to the webhook */
  eventTypes?: readonly ControllerEventType[];
  circuitBreaker?: CircuitBreaker;
}

/**
 * POSTs events as JSON. A circuit breaker stops hammering a webhook that
 * keeps failing and lets it recover on its own.
 */
export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook';
  private readonly logger: ServiceLogger;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly eventTypes: ReadonlySet<ControllerEventType>;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly webhookUrl: string | undefined, options: WebhookChannelOptions = {}) {
    this.logger = options.logger ?? createLogger('notifier:webhook');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.eventTypes = new Set(options.eventTypes ?? DEFAULT_WEBHOOK_EVENT_TYPES);
    this.breaker = options.circuitBreaker ?? new CircuitBreaker(
      { name: 'notify-webhook', ...DEFAULT_WEBHOOK_CIRCUIT },
      { logger: this.logger }
    );
  }

  isConfigured(): boolean {
    return !!this.webhookUrl;
  }

  async send(event: ControllerEvent): Promise<boolean> {
    const url = this.webhookUrl;
    if (!url || !this.eventTypes.has(event.type)) return false;

    try {
      await this.breaker.execute(async () => {
        const response = await withTimeout(this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(event)
        }), this.timeoutMs, 'webhook notification');

        if (!response.ok) {
          throw new Error(`Webhook responded ${response.status} ${response.statusText}`);
        }
      });
      return true;
    } catch (error) {
      if (error instanceof CircuitBreakerError) {
        this.logger.debug('Webhook circuit open, event not sent', { type: event.type });
      } else {
        this.logger.error('Webhook notification failed', { type: event.type, error: getErrorMessage(error) });
      }
      return false;
    }
  }
}

export interface NotifierDeps {
  channels?: NotificationChannel[];
  logger?: ServiceLogger;
}

type EventListener = (event: ControllerEvent) => void;

export class Notifier implements ControllerEventSink {
  private readonly channels: NotificationChannel[];
  private readonly logger: ServiceLogger;
  private readonly emitter = new EventEmitter();
  private readonly pending = new Set<Promise<void>>();

  constructor(deps: NotifierDeps = {}) {
    this.logger = deps.logger ?? createLogger('notifier');
    this.channels = (deps.channels ?? [new LogChannel(this.logger)]).filter(channel => channel.isConfigured());
  }

  emit(event: ControllerEvent): void {
    try {
      this.emitter.emit(event.type, event);
      this.emitter.emit('event', event);
    } catch (error) {
      this.logger.error('Controller event listener threw', { type: event.type, error: getErrorMessage(error) });
    }

    for (const channel of this.channels) {
      const delivery: Promise<void> = channel.send(event)
        .then(() => undefined, (error: unknown) => {
          this.logger.error('Notification channel failed', { channel: channel.name, type: event.type, error: getErrorMessage(error) });
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  /** Listen to every event, or to one event type. */
  on(listener: EventListener): this;
  on(type: ControllerEventType, listener: EventListener): this;
  on(typeOrListener: ControllerEventType | EventListener, maybeListener?: EventListener): this {
    if (typeof typeOrListener === 'function') {
      this.emitter.on('event', typeOrListener);
    } else if (maybeListener) {
      this.emitter.on(typeOrListener, maybeListener);
    }
    return this;
  }

  off(listener: EventListener): this {
    this.emitter.off('event', listener);
    for (const type of this.emitter.eventNames()) {
      this.emitter.off(type, listener);
    }
    return this;
  }

  getChannelNames(): string[] {
    return this.channels.map(channel => channel.name);
  }

  /**
   * Wait for channel deliveries started so far. Used at shutdown and in tests.
   */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }
}

function describeEvent(event: ControllerEvent): Record<string, unknown> {
  switch (event.type) {
    case 'detector_transition':
      return { regionId: event.transition.regionId, from: event.transition.from, to: event.transition.to, reason: event.transition.reason };
    case 'region_state_changed':
      return { regionId: event.regionId, from: event.from, to: event.to };
    case 'coordinator_state_changed':
      return { from: event.from.kind, to: event.to.kind };
    case 'failover_phase_changed':
      return { eventId: event.eventId, phase: event.phase, fromRegion: event.event.fromRegion, toRegion: event.event.toRegion };
    case 'failover_step':
      return { eventId: event.eventId, step: event.step.name, status: event.step.status, attempts: event.step.attempts };
    case 'escalation':
      return { severity: event.severity };
    case 'override_applied':
      return { kind: event.kind, operator: event.operator, accepted: event.accepted, message: event.message };
  }
}

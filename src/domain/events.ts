import type { JsonObject } from './json.js';

/**
 * Transient notifications emitted after a log is durably created or deleted.
 * Never persisted. `event_type` is the wire discriminator.
 */
export interface LogCreatedEvent {
  readonly event_type: 'created';
  readonly id: number;
  readonly schema_id: string;
  readonly log_data: JsonObject;
  readonly created_at: string; // ISO-8601
}

export interface LogDeletedEvent {
  readonly event_type: 'deleted';
  readonly id: number;
  readonly schema_id: string;
}

export type DomainEvent = LogCreatedEvent | LogDeletedEvent;

/**
 * Security Event Log
 *
 * Structured record of refused requests and detected threats. Events carry
 * the pattern, host or field involved and never the raw payload.
 *
 * @packageDocumentation
 */

import { Logger, defaultLogger } from '../utils/logger.js';

/**
 * Types of security events
 */
export enum SecurityEventType {
  INJECTION_DETECTED = 'INJECTION_DETECTED',
  FIELD_DROPPED = 'FIELD_DROPPED',
  INVALID_URL = 'INVALID_URL',
  BLOCKED_SCHEME = 'BLOCKED_SCHEME',
  BLOCKED_DOMAIN = 'BLOCKED_DOMAIN',
  OUTBOUND_REQUEST = 'OUTBOUND_REQUEST',
  NETWORK_RETRY = 'NETWORK_RETRY',
  NETWORK_FAILURE = 'NETWORK_FAILURE',
  CLIENT_ERROR = 'CLIENT_ERROR',
  LARGE_RESPONSE = 'LARGE_RESPONSE',
  ERROR_RESPONSE = 'ERROR_RESPONSE',
  INVALID_JSON = 'INVALID_JSON',
}

export interface SecurityEvent {
  type: SecurityEventType;
  timestamp: Date;
  details: Record<string, unknown>;
}

export interface SecurityEventLogConfig {
  /** Events kept in memory, oldest dropped first (default: 200) */
  maxEvents?: number;
  /** Called for each event, e.g. to forward to a monitoring service */
  onEvent?: (event: SecurityEvent) => void;
  logger?: Logger;
}

/**
 * Event types that are routine and logged at debug level
 */
const ROUTINE_EVENTS = new Set<SecurityEventType>([
  SecurityEventType.OUTBOUND_REQUEST,
  SecurityEventType.NETWORK_RETRY,
]);

export class SecurityEventLog {
  private readonly events: SecurityEvent[] = [];
  private readonly maxEvents: number;
  private readonly onEvent?: (event: SecurityEvent) => void;
  private readonly logger: Logger;
  private readonly getNow: () => number;

  /**
   * @param getNow - Optional clock (for testing)
   */
  constructor(config: SecurityEventLogConfig = {}, getNow?: () => number) {
    this.maxEvents = config.maxEvents ?? 200;
    this.onEvent = config.onEvent;
    this.logger = (config.logger ?? defaultLogger).child('Security');
    this.getNow = getNow ?? (() => Date.now());
  }

  record(type: SecurityEventType, details: Record<string, unknown> = {}): SecurityEvent {
    const event: SecurityEvent = { type, timestamp: new Date(this.getNow()), details };

    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    if (ROUTINE_EVENTS.has(type)) {
      this.logger.debug(type, details);
    } else {
      this.logger.warn(type, details);
    }

    if (this.onEvent) {
      try {
        this.onEvent(event);
      } catch (error) {
        this.logger.error('onEvent handler failed', { type }, error instanceof Error ? error : undefined);
      }
    }

    return event;
  }

  /**
   * Recorded events, oldest first, optionally filtered by type
   */
  list(type?: SecurityEventType): SecurityEvent[] {
    const events = type ? this.events.filter((e) => e.type === type) : this.events;
    return events.map((e) => ({ ...e, details: { ...e.details } }));
  }

  count(): number {
    return this.events.length;
  }

  clear(): void {
    this.events.length = 0;
  }
}

export function createSecurityEventLog(config?: SecurityEventLogConfig, getNow?: () => number): SecurityEventLog {
  return new SecurityEventLog(config, getNow);
}

/**
 * Secure Gateway Module
 *
 * Wrapper around outbound HTTP calls. Every request goes through:
 *
 *   validate URL → scan and sanitize body → attach headers →
 *   call with timeout → validate response → return (or retry)
 *
 * Destinations outside the allowlist are refused before any I/O. Transport
 * failures and timeouts are retried a bounded number of times with a fixed
 * delay; anything else propagates immediately.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { DEFAULT_ALLOWED_DOMAINS } from './config.js';
import { GatewayError, GatewayErrorCode, SecurityViolationError, toError } from './errors.js';
import { detectInjectionPattern, sanitize } from './security/input-guard.js';
import { maskSensitiveData } from './security/masking.js';
import { SecurityEventLog, SecurityEventType } from './security/security-events.js';
import { Logger } from './utils/logger.js';

export type HttpMethod = 'GET' | 'POST';

/**
 * Request handed to the transport
 */
export interface HttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/**
 * The part of a fetch `Response` the gateway reads
 */
export interface HttpResponse {
  status: number;
  text(): Promise<string>;
}

/**
 * HTTP function type for dependency injection
 *
 * A transport signals a non-retryable failure by rejecting with a
 * {@link GatewayError}; any other rejection is treated as a network error.
 */
export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

/**
 * Response with its body already read
 */
export interface GatewayResponse {
  status: number;
  body: string;
  /** Attempts made, including the successful one */
  attempts: number;
}

export interface GatewayRequestOptions {
  /** Merged over the default headers; caller values win, names compared case-insensitively */
  headers?: Record<string, string>;
  /** Overrides the gateway timeout for this call */
  timeoutMs?: number;
}

export interface GatewayPostOptions extends GatewayRequestOptions {
  body?: Record<string, unknown>;
  /** Scan and sanitize top-level string fields (default: true) */
  sanitizeBody?: boolean;
}

export interface GatewayConfig {
  /** Host substrings permitted outside development mode */
  allowedDomains?: readonly string[];
  /** Every http(s) host is permitted (default: false) */
  developmentMode?: boolean;
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay between attempts in ms (default: 2000) */
  retryDelayMs?: number;
  /** Default: `OfflinePrivacyKit/1.0` */
  userAgent?: string;
  /** Default: global fetch */
  transport?: HttpTransport;
  events?: SecurityEventLog;
  /** Logger for the event log created when `events` is not given */
  logger?: Logger;
  /** Delay implementation (for testing) */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_USER_AGENT = 'OfflinePrivacyKit/1.0';

/**
 * Bodies above this size are reported
 */
export const LARGE_RESPONSE_BYTES = 10 * 1024 * 1024;

const PREVIEW_LENGTH = 100;
const BLOCKED_URL_VISIBLE = 20;
const REQUEST_URL_VISIBLE = 30;

const fetchTransport: HttpTransport = (url, init) =>
  fetch(url, { method: init.method, headers: init.headers, body: init.body, signal: init.signal });

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Secure Gateway
 *
 * @example
 * ```typescript
 * const gateway = new SecureGateway({ events });
 *
 * const response = await gateway.post('https://openrouter.ai/api/v1/chat', {
 *   body: { prompt: userInput },
 *   headers: { Authorization: `Bearer ${apiKey}` },
 * });
 * const payload = gateway.parseJson(response);
 * ```
 */
export class SecureGateway {
  private readonly allowedDomains: readonly string[];
  private readonly developmentMode: boolean;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly userAgent: string;
  private readonly transport: HttpTransport;
  private readonly events: SecurityEventLog;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: GatewayConfig = {}) {
    this.allowedDomains = (config.allowedDomains ?? DEFAULT_ALLOWED_DOMAINS).map((d) => d.toLowerCase());
    this.developmentMode = config.developmentMode ?? false;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 2_000;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.transport = config.transport ?? fetchTransport;
    this.events = config.events ?? new SecurityEventLog({ logger: config.logger });
    this.sleep = config.sleep ?? defaultSleep;

    if (this.timeoutMs <= 0) {
      throw new Error('timeoutMs must be positive');
    }
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new Error('maxRetries must be a non-negative integer');
    }
  }

  /**
   * True if `url` is http(s) and its host contains an allowlisted
   * substring, or development mode is on. Refusals are recorded as
   * security events.
   */
  isAllowed(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      this.events.record(SecurityEventType.INVALID_URL, { inputLength: url.length });
      return false;
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      this.events.record(SecurityEventType.BLOCKED_SCHEME, {
        scheme: parsed.protocol.replace(/:$/, ''),
        host: parsed.hostname,
      });
      return false;
    }

    if (this.developmentMode) {
      return true;
    }

    const host = parsed.hostname.toLowerCase();
    if (this.allowedDomains.some((domain) => host.includes(domain))) {
      return true;
    }

    this.events.record(SecurityEventType.BLOCKED_DOMAIN, {
      host,
      target: maskSensitiveData(url, BLOCKED_URL_VISIBLE),
    });
    return false;
  }

  /**
   * @throws SecurityViolationError if the destination is not allowed
   * @throws GatewayError once retries are exhausted, or on a client error
   */
  async post(url: string, options: GatewayPostOptions = {}): Promise<GatewayResponse> {
    this.assertAllowed(url);

    const body =
      options.body === undefined
        ? undefined
        : options.sanitizeBody === false
          ? options.body
          : this.sanitizeBody(options.body);

    let payload: string | undefined;
    if (body !== undefined) {
      try {
        payload = JSON.stringify(body);
      } catch (error) {
        throw new GatewayError('Request body cannot be serialized', 'CLIENT_ERROR', 0, toError(error));
      }
    }

    const headers = mergeHeaders(
      { 'Content-Type': 'application/json', Accept: 'application/json', 'User-Agent': this.userAgent },
      options.headers
    );

    return this.send(url, 'POST', headers, payload, options.timeoutMs ?? this.timeoutMs);
  }

  /**
   * @throws SecurityViolationError if the destination is not allowed
   * @throws GatewayError once retries are exhausted, or on a client error
   */
  async get(url: string, options: GatewayRequestOptions = {}): Promise<GatewayResponse> {
    this.assertAllowed(url);

    const headers = mergeHeaders({ Accept: 'application/json', 'User-Agent': this.userAgent }, options.headers);

    return this.send(url, 'GET', headers, undefined, options.timeoutMs ?? this.timeoutMs);
  }

  /**
   * Reports oversized bodies and error statuses. Never rejects.
   */
  validateResponse(response: GatewayResponse): void {
    const sizeBytes = Buffer.byteLength(response.body, 'utf8');
    if (sizeBytes > LARGE_RESPONSE_BYTES) {
      this.events.record(SecurityEventType.LARGE_RESPONSE, { sizeBytes, status: response.status });
    }

    if (response.status >= 400) {
      this.events.record(SecurityEventType.ERROR_RESPONSE, {
        status: response.status,
        bodyPreview: preview(response.body),
      });
    }
  }

  /**
   * Parses the body, which must hold a JSON object. With a schema the
   * object is also validated against it.
   *
   * @throws GatewayError with code INVALID_JSON
   */
  parseJson(response: GatewayResponse): Record<string, unknown>;
  parseJson<T>(response: GatewayResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  parseJson<T>(response: GatewayResponse, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): Record<string, unknown> | T {
    let decoded: unknown;
    try {
      decoded = JSON.parse(response.body);
    } catch (error) {
      throw this.invalidJson(response, 'Response is not valid JSON', error);
    }

    if (!isPlainObject(decoded)) {
      throw this.invalidJson(response, 'Response is not a JSON object');
    }

    if (schema === undefined) {
      return decoded;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      throw this.invalidJson(response, 'Response does not match the expected shape', parsed.error);
    }
    return parsed.data;
  }

  private assertAllowed(url: string): void {
    if (!this.isAllowed(url)) {
      throw new SecurityViolationError(
        `Destination not allowed: ${maskSensitiveData(url, BLOCKED_URL_VISIBLE)}`,
        'DESTINATION_NOT_ALLOWED'
      );
    }
  }

  /**
   * Drops top-level string fields that match an injection heuristic and
   * HTML-sanitizes the rest. Other values pass through.
   */
  private sanitizeBody(body: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [field, value] of Object.entries(body)) {
      if (typeof value !== 'string') {
        sanitized[field] = value;
        continue;
      }

      const pattern = detectInjectionPattern(value);
      if (pattern !== null) {
        this.events.record(SecurityEventType.FIELD_DROPPED, { field, pattern, inputLength: value.length });
        continue;
      }

      sanitized[field] = sanitize(value);
    }

    return sanitized;
  }

  private async send(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    body: string | undefined,
    timeoutMs: number,
    attempt = 0
  ): Promise<GatewayResponse> {
    this.events.record(SecurityEventType.OUTBOUND_REQUEST, {
      method,
      target: maskSensitiveData(url, REQUEST_URL_VISIBLE),
      hasBody: body !== undefined,
      attempt: attempt + 1,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const raw = await this.transport(url, { method, headers, body, signal: controller.signal });
      const response: GatewayResponse = { status: raw.status, body: await raw.text(), attempts: attempt + 1 };
      this.validateResponse(response);
      return response;
    } catch (error) {
      if (error instanceof GatewayError) {
        this.events.record(SecurityEventType.CLIENT_ERROR, { method, code: error.gatewayCode });
        throw error;
      }

      const code: GatewayErrorCode = controller.signal.aborted ? 'TIMEOUT' : 'NETWORK_ERROR';

      if (attempt < this.maxRetries) {
        this.events.record(SecurityEventType.NETWORK_RETRY, {
          method,
          reason: code,
          retry: attempt + 1,
          maxRetries: this.maxRetries,
        });
        await this.sleep(this.retryDelayMs);
        return this.send(url, method, headers, body, timeoutMs, attempt + 1);
      }

      this.events.record(SecurityEventType.NETWORK_FAILURE, { method, reason: code, attempts: attempt + 1 });
      const message =
        code === 'TIMEOUT'
          ? `Request timed out after ${timeoutMs}ms (${attempt + 1} attempts)`
          : `Network error after ${attempt + 1} attempts`;
      throw new GatewayError(message, code, attempt + 1, toError(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private invalidJson(response: GatewayResponse, message: string, cause?: unknown): GatewayError {
    this.events.record(SecurityEventType.INVALID_JSON, {
      status: response.status,
      bodyPreview: preview(response.body),
    });
    return new GatewayError(message, 'INVALID_JSON', response.attempts, cause);
  }
}

/**
 * Merges `overrides` over `defaults`. Header names are compared
 * case-insensitively; the override keeps its own spelling.
 */
export function mergeHeaders(
  defaults: Record<string, string>,
  overrides: Record<string, string> = {}
): Record<string, string> {
  const merged = new Map<string, [string, string]>();
  for (const [name, value] of [...Object.entries(defaults), ...Object.entries(overrides)]) {
    merged.set(name.toLowerCase(), [name, value]);
  }
  return Object.fromEntries(merged.values());
}

function preview(body: string): string {
  return body.slice(0, PREVIEW_LENGTH);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createSecureGateway(config?: GatewayConfig): SecureGateway {
  return new SecureGateway(config);
}

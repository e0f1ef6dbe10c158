import {
  CapabilityDeniedError,
  InvalidAuthorizationError,
  LedgerErrorCodes,
  RemoteServiceUnavailableError,
  type ApplicationError,
  type NetworkInfo,
  type SealedValue,
  type UserDecryptionRequest,
} from '@cipherledger/application';
import { z } from 'zod';
import { LedgerRequestError } from './errors';
import type {
  CachedStatisticsView,
  LedgerGatewayPort,
  RecordEventRequest,
  RecordEventResponse,
  StatisticsView,
} from './types';

export type HttpLedgerTransportOptions = Readonly<{
  baseUrl: string;
  /** Address sent as `x-principal`; the gateway in front of the API authenticates it. */
  principal: string;
  fetchImpl?: typeof fetch;
}>;

const handleResponseSchema = z.object({ handle: z.string() });
const eventCountResponseSchema = z.object({ eventCount: z.number().int() });
const historyLengthResponseSchema = z.object({ historyLength: z.number().int() });
const lastActivityResponseSchema = z.object({ lastActivity: z.number().int() });
const rangeResponseSchema = z.object({ handles: z.array(z.string()) });
const batchResponseSchema = z.object({ results: z.array(z.boolean()) });
const recordResponseSchema = z.object({
  user: z.string(),
  index: z.number().int(),
  eventCount: z.number().int(),
  handle: z.string(),
});
const statisticsResponseSchema = z.object({
  eventCount: z.number().int(),
  lastActivity: z.number().int(),
  hasData: z.boolean(),
});
const cachedStatisticsResponseSchema = statisticsResponseSchema.extend({
  packed: z.string(),
});
const networkResponseSchema = z.object({
  systemAddress: z.string(),
  networkPublicKey: z.string(),
});
const capabilityResponseSchema = z.object({ mayDecrypt: z.boolean() });
const userDecryptResponseSchema = z.object({
  results: z.array(z.object({ handle: z.string(), sealed: z.string() })),
});

const normalizeBaseUrl = (baseUrl: string): string => (baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl);

const toBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString('base64');
const fromBase64 = (value: string): Uint8Array => new Uint8Array(Buffer.from(value, 'base64'));

const isObject = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const parseJson = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const extractErrorMessage = (payload: unknown): string | null => {
  if (!isObject(payload)) return null;
  const message = payload.message;
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message) && message.every((item) => typeof item === 'string')) {
    return message.join(' | ');
  }
  return null;
};

const extractErrorCode = (payload: unknown): string | null =>
  isObject(payload) && typeof payload.code === 'string' ? payload.code : null;

const toRequestError = (path: string, status: number, payload: unknown): ApplicationError => {
  const message = extractErrorMessage(payload) ?? `Request to ${path} failed (status ${status})`;
  const code = extractErrorCode(payload);
  if (code === LedgerErrorCodes.capabilityDenied || status === 403) {
    return new CapabilityDeniedError(message);
  }
  if (code === LedgerErrorCodes.invalidAuthorization) {
    return new InvalidAuthorizationError(message);
  }
  if (status >= 500) {
    return new RemoteServiceUnavailableError(message);
  }
  return new LedgerRequestError(message, code ?? 'request_failed', status, payload);
};

/**
 * Ledger API client over fetch. Every response body is validated before it
 * reaches the caller.
 */
export class HttpLedgerTransport implements LedgerGatewayPort {
  private readonly baseUrl: string;
  private readonly principal: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpLedgerTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.principal = options.principal;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getNetwork(): Promise<NetworkInfo> {
    const body = await this.requestJson('/decryption/network', { method: 'GET' }, networkResponseSchema);
    return {
      systemAddress: body.systemAddress,
      networkPublicKey: fromBase64(body.networkPublicKey),
    };
  }

  async recordEvent(request: RecordEventRequest): Promise<RecordEventResponse> {
    return this.requestJson(
      '/ledger/events',
      {
        method: 'POST',
        body: JSON.stringify({ handle: request.handle, inputProof: toBase64(request.inputProof) }),
      },
      recordResponseSchema
    );
  }

  async validateBatch(request: {
    handles: readonly string[];
    inputProofs: readonly Uint8Array[];
  }): Promise<boolean[]> {
    const body = await this.requestJson(
      '/ledger/batch-validations',
      {
        method: 'POST',
        body: JSON.stringify({
          handles: request.handles,
          inputProofs: request.inputProofs.map(toBase64),
        }),
      },
      batchResponseSchema
    );
    return body.results;
  }

  async getTotal(user: string): Promise<string> {
    const body = await this.requestJson(`${this.userPath(user)}/total`, { method: 'GET' }, handleResponseSchema);
    return body.handle;
  }

  async getAverage(user: string): Promise<string> {
    const body = await this.requestJson(`${this.userPath(user)}/average`, { method: 'GET' }, handleResponseSchema);
    return body.handle;
  }

  async getEventCount(user: string): Promise<number> {
    const body = await this.requestJson(`${this.userPath(user)}/count`, { method: 'GET' }, eventCountResponseSchema);
    return body.eventCount;
  }

  async getHistoryLength(user: string): Promise<number> {
    const body = await this.requestJson(
      `${this.userPath(user)}/history-length`,
      { method: 'GET' },
      historyLengthResponseSchema
    );
    return body.historyLength;
  }

  async getLastActivity(user: string): Promise<number> {
    const body = await this.requestJson(
      `${this.userPath(user)}/last-activity`,
      { method: 'GET' },
      lastActivityResponseSchema
    );
    return body.lastActivity;
  }

  async getByIndex(user: string, index: number): Promise<string> {
    const body = await this.requestJson(
      `${this.userPath(user)}/events/${index}`,
      { method: 'GET' },
      handleResponseSchema
    );
    return body.handle;
  }

  async getRange(user: string, start: number, end: number): Promise<string[]> {
    const query = new URLSearchParams({ start: String(start), end: String(end) });
    const body = await this.requestJson(
      `${this.userPath(user)}/events?${query.toString()}`,
      { method: 'GET' },
      rangeResponseSchema
    );
    return body.handles;
  }

  async getLiveStatistics(user: string): Promise<StatisticsView> {
    return this.requestJson(`${this.userPath(user)}/statistics`, { method: 'POST' }, statisticsResponseSchema);
  }

  async getCachedStatistics(user: string): Promise<CachedStatisticsView> {
    return this.requestJson(
      `${this.userPath(user)}/statistics/cached`,
      { method: 'GET' },
      cachedStatisticsResponseSchema
    );
  }

  async mayDecrypt(handle: string, principal: string): Promise<boolean> {
    const query = new URLSearchParams({ principal });
    const body = await this.requestJson(
      `/decryption/capabilities/${encodeURIComponent(handle)}?${query.toString()}`,
      { method: 'GET' },
      capabilityResponseSchema
    );
    return body.mayDecrypt;
  }

  async userDecrypt(request: UserDecryptionRequest): Promise<SealedValue[]> {
    const { authorization } = request;
    const body = await this.requestJson(
      '/decryption/user-decrypt',
      {
        method: 'POST',
        body: JSON.stringify({
          handles: request.handles,
          user: request.user,
          signerPublicKey: toBase64(request.signerPublicKey),
          signature: toBase64(request.signature),
          authorization: {
            sessionPublicKey: toBase64(authorization.sessionPublicKey),
            systemAddresses: authorization.systemAddresses,
            startTimestamp: authorization.startTimestamp,
            durationDays: authorization.durationDays,
          },
        }),
      },
      userDecryptResponseSchema
    );
    return body.results.map((r) => ({ handle: r.handle, sealed: fromBase64(r.sealed) }));
  }

  private userPath(user: string): string {
    return `/ledger/${encodeURIComponent(user)}`;
  }

  private async requestJson<T>(path: string, init: RequestInit, schema: z.ZodSchema<T>): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: {
          'content-type': 'application/json',
          'x-principal': this.principal,
        },
      });
    } catch (err) {
      const message = err instanceof Error ? `Network error calling ${path}: ${err.message}` : `Network error calling ${path}`;
      throw new RemoteServiceUnavailableError(message);
    }

    const payload = await parseJson(response);
    if (!response.ok) {
      throw toRequestError(path, response.status, payload);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new LedgerRequestError(`Unexpected response from ${path}`, 'invalid_response', response.status, payload);
    }
    return parsed.data;
  }
}

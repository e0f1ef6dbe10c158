import {
  CapabilityDeniedError,
  InvalidAuthorizationError,
  RemoteServiceUnavailableError,
} from '@cipherledger/application';
import { describe, expect, it, vi } from 'vitest';
import { LedgerRequestError } from '../src/errors';
import { HttpLedgerTransport } from '../src/httpTransport';

const USER = '0x70997970c51812dc3a010c7d01b50e0d17dc79c8';
const HANDLE = `0x${'ab'.repeat(32)}`;

const makeResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const makeTransport = (fetchImpl: typeof fetch): HttpLedgerTransport =>
  new HttpLedgerTransport({ baseUrl: 'https://ledger.test/', principal: USER, fetchImpl });

describe('HttpLedgerTransport', () => {
  it('posts a trust event with the principal header and base64 proof', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(makeResponse({ user: USER, index: 0, eventCount: 1, handle: HANDLE }, 201));
    const transport = makeTransport(fetchImpl);

    const result = await transport.recordEvent({ handle: HANDLE, inputProof: new Uint8Array([1, 2, 3]) });

    expect(result).toEqual({ user: USER, index: 0, eventCount: 1, handle: HANDLE });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://ledger.test/ledger/events');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'content-type': 'application/json', 'x-principal': USER });
    expect(JSON.parse(init.body)).toEqual({ handle: HANDLE, inputProof: 'AQID' });
  });

  it('builds range queries', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(makeResponse({ start: 1, end: 3, handles: [HANDLE, HANDLE] }));
    const transport = makeTransport(fetchImpl);

    await expect(transport.getRange(USER, 1, 3)).resolves.toEqual([HANDLE, HANDLE]);
    expect(fetchImpl.mock.calls[0][0]).toBe(`https://ledger.test/ledger/${USER}/events?start=1&end=3`);
  });

  it('decodes the network public key', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(makeResponse({ systemAddress: USER, networkPublicKey: 'BAUG' }));
    const transport = makeTransport(fetchImpl);

    const network = await transport.getNetwork();

    expect(network.systemAddress).toBe(USER);
    expect(Array.from(network.networkPublicKey)).toEqual([4, 5, 6]);
  });

  it('encodes a user decryption request and decodes sealed values', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(makeResponse({ results: [{ handle: HANDLE, sealed: 'CQk=' }] }));
    const transport = makeTransport(fetchImpl);

    const sealed = await transport.userDecrypt({
      handles: [HANDLE],
      user: USER,
      signerPublicKey: new Uint8Array([1]),
      signature: new Uint8Array([2]),
      authorization: {
        sessionPublicKey: new Uint8Array([3]),
        systemAddresses: [USER],
        startTimestamp: 100,
        durationDays: 1,
      },
    });

    expect(sealed).toHaveLength(1);
    expect(sealed[0].handle).toBe(HANDLE);
    expect(Array.from(sealed[0].sealed)).toEqual([9, 9]);
    expect(JSON.parse(fetchImpl.mock.calls[0][1].body)).toEqual({
      handles: [HANDLE],
      user: USER,
      signerPublicKey: 'AQ==',
      signature: 'Ag==',
      authorization: {
        sessionPublicKey: 'Aw==',
        systemAddresses: [USER],
        startTimestamp: 100,
        durationDays: 1,
      },
    });
  });

  it('maps a forbidden response to a capability denial', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(makeResponse({ code: 'capability_denied', message: 'Principal may not decrypt' }, 403));
    const transport = makeTransport(fetchImpl);

    const error = await transport.mayDecrypt(HANDLE, USER).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CapabilityDeniedError);
    expect(error).toHaveProperty('message', 'Principal may not decrypt');
  });

  it('maps an invalid authorization code', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(makeResponse({ code: 'invalid_authorization', message: 'Authorization has expired' }, 401));
    const transport = makeTransport(fetchImpl);

    await expect(transport.getTotal(USER)).rejects.toBeInstanceOf(InvalidAuthorizationError);
  });

  it('maps server errors and network failures to remote unavailability', async () => {
    const failing = makeTransport(vi.fn().mockResolvedValue(makeResponse({ message: 'down' }, 503)));
    await expect(failing.getAverage(USER)).rejects.toBeInstanceOf(RemoteServiceUnavailableError);

    const offline = makeTransport(vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));
    await expect(offline.getEventCount(USER)).rejects.toThrow(
      new RemoteServiceUnavailableError(`Network error calling /ledger/${USER}/count: ECONNREFUSED`)
    );
  });

  it('keeps the ledger error code of other client errors', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(makeResponse({ code: 'index_out_of_bounds', message: 'Index out of bounds' }, 400));
    const transport = makeTransport(fetchImpl);

    const error = await transport.getByIndex(USER, 4).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LedgerRequestError);
    expect(error).toMatchObject({ code: 'index_out_of_bounds', status: 400, message: 'Index out of bounds' });
  });

  it('rejects a response body of the wrong shape', async () => {
    const transport = makeTransport(vi.fn().mockResolvedValue(makeResponse({ eventCount: 'three' })));

    await expect(transport.getEventCount(USER)).rejects.toMatchObject({ code: 'invalid_response' });
  });
});

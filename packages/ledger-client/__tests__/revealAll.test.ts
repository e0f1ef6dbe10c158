import { EncryptedTypes } from '@cipherledger/domain';
import { describe, expect, it } from 'vitest';
import { revealAll, revealedValues } from '../src/revealAll';
import { ScoreSubmitter } from '../src/ScoreSubmitter';
import { RevealErrorCodes } from '../src/types';
import { createInProcessLedger, NOW_SECONDS, SYSTEM_ADDRESS } from './fixtures/inProcessLedger';

describe('revealAll', () => {
  it('reveals what it can and reports the rest', async () => {
    const ledger = await createInProcessLedger();
    const alice = await ledger.createWallet();
    const bob = await ledger.createWallet();
    const aliceHandle = (
      await new ScoreSubmitter({
        gateway: ledger.gatewayFor(alice.address),
        encoder: ledger.encoder,
        submitter: alice.address,
      }).submit(9)
    ).handle;
    const bobHandle = (
      await new ScoreSubmitter({
        gateway: ledger.gatewayFor(bob.address),
        encoder: ledger.encoder,
        submitter: bob.address,
      }).submit(2)
    ).handle;

    const results = await revealAll([aliceHandle, bobHandle], {
      systemAddress: SYSTEM_ADDRESS,
      gateway: ledger.gatewayFor(alice.address),
      wallet: alice,
      crypto: ledger.crypto,
      now: () => NOW_SECONDS,
    });

    expect(results).toHaveLength(2);
    expect(results[0]).toEqual({
      handle: aliceHandle,
      outcome: { ok: true, plaintext: { type: EncryptedTypes.euint32, value: 9 } },
    });
    expect(results[1].handle).toBe(bobHandle);
    expect(results[1].outcome.ok).toBe(false);
    if (!results[1].outcome.ok) {
      expect(results[1].outcome.error.code).toBe(RevealErrorCodes.capabilityDenied);
    }
    expect([...revealedValues(results).entries()]).toEqual([
      [aliceHandle, { type: EncryptedTypes.euint32, value: 9 }],
    ]);
  });
});

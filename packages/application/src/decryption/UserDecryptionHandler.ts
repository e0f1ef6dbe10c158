import { CiphertextHandle, Timestamp, UserAddress } from '@cipherledger/domain';
import { CapabilityDeniedError, InvalidAuthorizationError } from '../errors/ledgerErrors';
import { BaseCommandHandler } from '../shared/ports/BaseCommandHandler';
import type { CryptoServicePort } from '../shared/ports/CryptoServicePort';
import type { CapabilityDirectoryPort } from '../ledger/ports/CapabilityDirectoryPort';
import { authorizationExpiresAt, deriveAddress, encodeAuthorization } from './authorization';
import type { DecryptionOraclePort } from './ports/DecryptionOraclePort';
import { sealValue } from './sealedValue';
import type { SealedValue, UserDecryptionRequest } from './types';

export type UserDecryptionHandlerDeps = Readonly<{
  directory: CapabilityDirectoryPort;
  oracle: DecryptionOraclePort;
  crypto: CryptoServicePort;
  systemAddress: UserAddress;
  maxValidityDays: number;
  now?: () => Timestamp;
}>;

/**
 * Re-encrypts ciphertexts to a holder's session key after checking the
 * holder's signed authorization and the capability directory.
 */
export class UserDecryptionHandler extends BaseCommandHandler {
  private readonly now: () => Timestamp;

  constructor(private readonly deps: UserDecryptionHandlerDeps) {
    super();
    this.now = deps.now ?? Timestamp.now;
  }

  async handle(request: UserDecryptionRequest): Promise<SealedValue[]> {
    const { user, handles, durationDays, startTimestamp } = this.parseCommand(request, {
      user: (r) => UserAddress.from(r.user),
      handles: (r) => {
        if (r.handles.length === 0) {
          throw new Error('At least one handle is required');
        }
        return r.handles.map((h) => CiphertextHandle.from(h));
      },
      durationDays: (r) => this.parseNonNegativeInteger(r.authorization.durationDays, 'durationDays'),
      startTimestamp: (r) => this.parseNonNegativeInteger(r.authorization.startTimestamp, 'startTimestamp'),
    });

    await this.assertAuthorized(request, user, durationDays, startTimestamp);

    for (const handle of handles) {
      const [userMay, systemMay] = await Promise.all([
        this.deps.directory.mayDecrypt(handle, user),
        this.deps.directory.mayDecrypt(handle, this.deps.systemAddress),
      ]);
      if (!userMay || !systemMay) {
        throw new CapabilityDeniedError(`${user.value} may not decrypt ${handle.value}`);
      }
    }

    const sealed: SealedValue[] = [];
    for (const handle of handles) {
      const plaintext = await this.deps.oracle.decrypt(handle);
      sealed.push(await sealValue(this.deps.crypto, handle, plaintext, request.authorization.sessionPublicKey));
    }
    return sealed;
  }

  private async assertAuthorized(
    request: UserDecryptionRequest,
    user: UserAddress,
    durationDays: number,
    startTimestamp: number
  ): Promise<void> {
    const { authorization } = request;

    const signer = await deriveAddress(this.deps.crypto, request.signerPublicKey);
    if (!signer.equals(user)) {
      throw new InvalidAuthorizationError('Signer public key does not belong to user');
    }

    const coversSystem = authorization.systemAddresses.some(
      (address) => address.toLowerCase() === this.deps.systemAddress.value
    );
    if (!coversSystem) {
      throw new InvalidAuthorizationError('Authorization does not cover this ledger system');
    }

    const validSignature = await this.deps.crypto.verify(
      encodeAuthorization(authorization),
      request.signature,
      request.signerPublicKey
    );
    if (!validSignature) {
      throw new InvalidAuthorizationError('Authorization signature is invalid');
    }

    if (durationDays < 1 || durationDays > this.deps.maxValidityDays) {
      throw new InvalidAuthorizationError(`durationDays must be between 1 and ${this.deps.maxValidityDays}`);
    }
    const nowSeconds = this.now().toUnixSeconds();
    if (nowSeconds < startTimestamp) {
      throw new InvalidAuthorizationError('Authorization is not valid yet');
    }
    if (nowSeconds >= authorizationExpiresAt({ ...authorization, startTimestamp, durationDays })) {
      throw new InvalidAuthorizationError('Authorization has expired');
    }
  }
}

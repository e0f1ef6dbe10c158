import {
  RecordTrustEvent,
  ValidateBatch,
  deriveAddress,
  type NetworkInfo,
} from '@cipherledger/application';
import { Timestamp } from '@cipherledger/domain';
import {
  EncryptedInputEncoder,
  NodeCryptoService,
  bootstrapTrustLedger,
  generateNetworkKeys,
  type TrustLedgerServices,
} from '@cipherledger/infrastructure';
import type { EncryptedInputPort, LedgerGatewayPort, WalletPort } from '../../src/types';

export const SYSTEM_ADDRESS = '0x5fbdb2315678afecb367f032d93f642f64180aa3';
export const NOW_SECONDS = 1_750_000_000;

export type ClientGateway = Pick<LedgerGatewayPort, 'getNetwork' | 'recordEvent' | 'validateBatch' | 'userDecrypt'>;

export type InProcessLedger = Readonly<{
  services: TrustLedgerServices;
  crypto: NodeCryptoService;
  encoder: EncryptedInputPort;
  gatewayFor(principal: string): ClientGateway;
  createWallet(): Promise<WalletPort>;
}>;

/**
 * The ledger services wired in memory behind the client's gateway port.
 */
export const createInProcessLedger = async (): Promise<InProcessLedger> => {
  const crypto = new NodeCryptoService();
  const network = await generateNetworkKeys(crypto);
  const services = await bootstrapTrustLedger({
    systemAddress: SYSTEM_ADDRESS,
    network,
    maxValidityDays: 30,
    now: () => Timestamp.fromUnixSeconds(NOW_SECONDS),
  });
  const networkInfo: NetworkInfo = {
    systemAddress: SYSTEM_ADDRESS,
    networkPublicKey: services.networkPublicKey,
  };

  const encoder: EncryptedInputPort = {
    encrypt: ({ network: info, submitter, values }) =>
      values
        .reduce(
          (builder, value) => builder.add32(value),
          new EncryptedInputEncoder(crypto, info.networkPublicKey).createEncryptedInput(info.systemAddress, submitter)
        )
        .encrypt(),
  };

  return {
    services,
    crypto,
    encoder,
    gatewayFor: (principal) => ({
      getNetwork: async () => networkInfo,
      recordEvent: (request) =>
        services.commands.handleRecord(
          new RecordTrustEvent(
            {
              user: principal,
              handle: request.handle,
              inputProof: request.inputProof,
              timestamp: Timestamp.fromUnixSeconds(NOW_SECONDS).value,
            },
            { actorId: principal }
          )
        ),
      validateBatch: (request) =>
        services.commands.handleValidateBatch(
          new ValidateBatch({ user: principal, handles: request.handles, inputProofs: request.inputProofs })
        ),
      userDecrypt: (request) => services.userDecryption.handle(request),
    }),
    async createWallet() {
      const keys = await crypto.generateSigningKeyPair();
      const address = await deriveAddress(crypto, keys.publicKey);
      return {
        address: address.value,
        publicKey: keys.publicKey,
        signAuthorization: (payload) => crypto.sign(payload, keys.privateKey),
      };
    },
  };
};

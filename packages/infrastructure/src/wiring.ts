import {
  TrustLedgerCommandHandler,
  TrustLedgerQueryHandler,
  UserDecryptionHandler,
  type CapabilityDirectoryPort,
  type EventBusPort,
  type TrustLedgerReadModelPort,
  type TrustLedgerRepositoryPort,
} from '@cipherledger/application';
import { UserAddress, type Timestamp } from '@cipherledger/domain';
import { InMemoryEventBus } from './bus/InMemoryEventBus';
import { InMemoryCapabilityDirectory } from './capabilities/InMemoryCapabilityDirectory';
import { NodeCryptoService } from './crypto/NodeCryptoService';
import type { CiphertextStorePort } from './executor/CiphertextStorePort';
import { InMemoryCiphertextStore } from './executor/InMemoryCiphertextStore';
import { LocalFheExecutor } from './executor/LocalFheExecutor';
import { InputProofVerifier } from './input/InputProofVerifier';
import { InMemoryTrustLedgerStore } from './ledger/InMemoryTrustLedgerStore';

export type NetworkKeys = Readonly<{
  /** Raw P-256 ECDH public key that inputs are sealed to. */
  publicKey: Uint8Array;
  privateKey: Uint8Array;
  /** 32-byte secret protecting the ciphertext arena at rest. */
  storageKey: Uint8Array;
}>;

export type TrustLedgerServices = Readonly<{
  crypto: NodeCryptoService;
  systemAddress: UserAddress;
  networkPublicKey: Uint8Array;
  executor: LocalFheExecutor;
  directory: CapabilityDirectoryPort;
  commands: TrustLedgerCommandHandler;
  queries: TrustLedgerQueryHandler;
  userDecryption: UserDecryptionHandler;
}>;

export type TrustLedgerBootstrapDeps = Readonly<{
  systemAddress: string;
  network: NetworkKeys;
  maxValidityDays: number;
  repository?: TrustLedgerRepositoryPort;
  readModel?: TrustLedgerReadModelPort;
  ciphertexts?: CiphertextStorePort;
  directory?: CapabilityDirectoryPort;
  eventBus?: EventBusPort;
  now?: () => Timestamp;
}>;

/**
 * Assemble the ledger bounded context. Any store left out falls back to its
 * in-memory adapter; repository and read model must be given together.
 */
export const bootstrapTrustLedger = async (deps: TrustLedgerBootstrapDeps): Promise<TrustLedgerServices> => {
  const crypto = new NodeCryptoService();
  const systemAddress = UserAddress.from(deps.systemAddress);

  let repository: TrustLedgerRepositoryPort;
  let readModel: TrustLedgerReadModelPort;
  if (deps.repository && deps.readModel) {
    repository = deps.repository;
    readModel = deps.readModel;
  } else if (!deps.repository && !deps.readModel) {
    const store = new InMemoryTrustLedgerStore();
    repository = store;
    readModel = store;
  } else {
    throw new Error('Ledger repository and read model must be provided together');
  }

  const directory = deps.directory ?? new InMemoryCapabilityDirectory();
  const executor = await LocalFheExecutor.create({
    store: deps.ciphertexts ?? new InMemoryCiphertextStore(),
    crypto,
    networkStorageKey: deps.network.storageKey,
    networkPrivateKey: deps.network.privateKey,
  });

  return {
    crypto,
    systemAddress,
    networkPublicKey: deps.network.publicKey,
    executor,
    directory,
    commands: new TrustLedgerCommandHandler({
      repository,
      verifier: new InputProofVerifier(crypto, executor, systemAddress),
      compute: executor,
      directory,
      eventBus: deps.eventBus ?? new InMemoryEventBus(),
      systemAddress,
    }),
    queries: new TrustLedgerQueryHandler(readModel),
    userDecryption: new UserDecryptionHandler({
      directory,
      oracle: executor,
      crypto,
      systemAddress,
      maxValidityDays: deps.maxValidityDays,
      now: deps.now,
    }),
  };
};

/**
 * Fresh network key material, for tests and local development.
 */
export const generateNetworkKeys = async (crypto = new NodeCryptoService()): Promise<NetworkKeys> => {
  const { publicKey, privateKey } = await crypto.generateEncryptionKeyPair();
  return { publicKey, privateKey, storageKey: await crypto.generateKey() };
};

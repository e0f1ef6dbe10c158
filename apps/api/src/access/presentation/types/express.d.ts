import type { UserAddress } from '@cipherledger/domain';

declare module 'express-serve-static-core' {
  interface Request {
    principal?: UserAddress;
  }
}

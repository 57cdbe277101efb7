import type { TrustFilter, TrustRecord } from '../lockout.types';

export interface TrustStore {
  recordLogout(input: { username: string; ipAddress: string; at: Date }): Promise<TrustRecord>;
  list(filter: TrustFilter): Promise<TrustRecord[]>;
  revoke(filter: TrustFilter): Promise<number>;
}

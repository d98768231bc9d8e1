/**
 * @fileoverview Shared-secret access control for the HTTP API.
 *
 * Clients send the configured password in the `x-secret` header. Reads and writes are
 * guarded separately by `auth.passwordForRead` and `auth.passwordForWrite`. Secrets are
 * compared as SHA-256 digests with crypto.timingSafeEqual so the comparison time does
 * not depend on where the strings differ. An empty configured password rejects every
 * request that needs one.
 */

import * as crypto from 'crypto';
import type { ConfigManager } from '../../managers/ConfigManager';
import type { AccessKind } from '../types/web-api.types';

export const SECRET_HEADER = 'x-secret';

export interface AuthStatus {
  readonly readProtected: boolean;
  readonly writeProtected: boolean;
  readonly hasPassword: boolean;
}

export class AuthManager {
  constructor(private readonly configManager: ConfigManager) {}

  /**
   * Whether requests of this kind must present the secret
   */
  public isAuthenticationRequired(access: AccessKind): boolean {
    const auth = this.configManager.get('auth');
    return access === 'read' ? auth.passwordForRead : auth.passwordForWrite;
  }

  /**
   * Check a presented secret against the configured password
   */
  public verifySecret(presented: string | undefined): boolean {
    const password = this.configManager.get('auth').password;
    if (password.length === 0 || presented === undefined) {
      return false;
    }
    return crypto.timingSafeEqual(digest(presented), digest(password));
  }

  /**
   * Whether a request of this kind carrying this secret may proceed
   */
  public isAuthorized(access: AccessKind, presented: string | undefined): boolean {
    return !this.isAuthenticationRequired(access) || this.verifySecret(presented);
  }

  public getAuthStatus(): AuthStatus {
    const auth = this.configManager.get('auth');
    return {
      readProtected: auth.passwordForRead,
      writeProtected: auth.passwordForWrite,
      hasPassword: auth.password.length > 0
    };
  }
}

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value, 'utf8').digest();
}

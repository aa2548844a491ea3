/**
 * Bastion Kernel — Access Tokens
 *
 * The Interaction Guard is the only caller of issue(). The Partition Store
 * is the only caller of redeem(). A token is bound to one operation on one
 * key of one partition and is spent by its first redemption, whether or
 * not that redemption matches. A caller that ends up not using a token
 * releases it.
 */

import { randomUUID } from 'node:crypto';

import { TokenInvalidError } from '../errors.js';

declare const __brand: unique symbol;

/** Opaque single-use capability handed out on Allow. */
export type AccessToken = string & { readonly [__brand]: 'AccessToken' };

export type TokenOperation = 'read' | 'write';

export interface TokenScope {
  readonly operation: TokenOperation;
  readonly partition_id: string;
  readonly key: string;
}

/** The half of the issuer the store is given. */
export interface TokenRedeemer {
  redeem(token: AccessToken, scope: TokenScope): void;
}

export class TokenIssuer implements TokenRedeemer {
  private readonly live = new Map<string, TokenScope>();

  issue(scope: TokenScope): AccessToken {
    // The only place a plain string becomes an AccessToken.
    const token = `tok_${randomUUID()}` as AccessToken;
    this.live.set(token, scope);
    return token;
  }

  redeem(token: AccessToken, scope: TokenScope): void {
    const bound = this.live.get(token);
    if (bound === undefined) {
      throw new TokenInvalidError('unknown or already used');
    }
    this.live.delete(token);
    if (
      bound.operation !== scope.operation ||
      bound.partition_id !== scope.partition_id ||
      bound.key !== scope.key
    ) {
      throw new TokenInvalidError(
        `issued for ${bound.operation} ${bound.partition_id}/${bound.key}, ` +
          `presented for ${scope.operation} ${scope.partition_id}/${scope.key}`,
      );
    }
  }

  /** Drop a token without using it. Releasing a spent token does nothing. */
  release(token: AccessToken): void {
    this.live.delete(token);
  }

  /** Number of issued tokens not yet redeemed or released. */
  get outstanding(): number {
    return this.live.size;
  }
}

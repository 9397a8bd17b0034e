import * as jose from 'jose';
import { Config } from '../config/config';
import {
  ExpiredError,
  InvalidSignatureError,
  MalformedError,
} from '../middleware/error.middleware';
import { Clock, systemClock } from '../utils/clock';

export const TOKEN_ISSUER = 'crm-local';
const ALGORITHM = 'HS256';

export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Issues and validates signed, time-limited identity tokens (JWT, HS256).
 *
 * Tokens carry only the subject and their lifetime; role and account state
 * are read from the credential store on every request. There is no
 * revocation list: a token stays valid until it expires or the secret key
 * changes.
 */
export class TokenService {
  private secret: Uint8Array;
  private expireMinutes: number;
  private clock: Clock;

  constructor(
    auth: Pick<Config['auth'], 'secretKey' | 'tokenExpireMinutes'>,
    clock: Clock = systemClock
  ) {
    this.secret = new TextEncoder().encode(auth.secretKey);
    this.expireMinutes = auth.tokenExpireMinutes;
    this.clock = clock;
  }

  /**
   * Token lifetime in seconds
   */
  getLifetimeSeconds(): number {
    return this.expireMinutes * 60;
  }

  /**
   * Sign a token for the user. `iat` is the current time rounded down to
   * whole seconds and `exp` is `iat` plus the configured lifetime, so a token
   * issued part way through a second expires up to one second before
   * issue time plus lifetime.
   */
  async issue(username: string): Promise<IssuedToken> {
    const iat = Math.floor(this.clock.now().getTime() / 1000);
    const exp = iat + this.getLifetimeSeconds();

    const token = await new jose.SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(username)
      .setIssuer(TOKEN_ISSUER)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.secret);

    return {
      token,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  /**
   * Verify signature and expiry, returning the subject username.
   * Signature is checked before expiry.
   */
  async validate(token: string): Promise<string> {
    if (token.split('.').length !== 3) {
      throw new MalformedError('Token is not a compact JWS');
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        algorithms: [ALGORITHM],
        issuer: TOKEN_ISSUER,
        requiredClaims: ['sub', 'iat', 'exp'],
        currentDate: this.clock.now(),
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        throw new ExpiredError();
      }
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new InvalidSignatureError();
      }
      if (error instanceof jose.errors.JOSEError) {
        throw new MalformedError(`Token rejected: ${error.code}`);
      }
      throw error;
    }

    if (typeof payload.sub !== 'string' || payload.sub === '') {
      throw new MalformedError('Token subject is missing');
    }

    return payload.sub;
  }
}

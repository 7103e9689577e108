/**
 * Coinbase Advanced Trade API Authentication
 *
 * Uses JWT-based authentication with EC private keys (ES256).
 * Reference: https://docs.cdp.coinbase.com/advanced-trade/docs/rest-api-auth
 */
import jwt from 'jsonwebtoken';

/** Token lifetime accepted by Coinbase */
const TOKEN_TTL_SECONDS = 120;

export class CoinbaseAuth {
  private apiKeyName: string;
  private privateKey: string;
  private now: () => number;

  constructor(apiKeyName: string, privateKeyPem: string, now: () => number = () => Date.now()) {
    this.apiKeyName = apiKeyName;
    // Handle PEM keys stored with literal \n strings (common in env vars)
    this.privateKey = privateKeyPem.replace(/\\n/g, '\n');
    this.now = now;
  }

  /**
   * JWT for one REST request
   * @param requestPath - path without query string (e.g., /api/v3/brokerage/products/BTC-USD/candles)
   */
  generateRestToken(method: string, requestPath: string, host = 'api.coinbase.com'): string {
    const now = Math.floor(this.now() / 1000);

    return jwt.sign(
      {
        sub: this.apiKeyName,
        iss: 'cdp',
        nbf: now,
        exp: now + TOKEN_TTL_SECONDS,
        uri: `${method} ${host}${requestPath}`,
      },
      this.privateKey,
      {
        algorithm: 'ES256',
        header: {
          alg: 'ES256',
          kid: this.apiKeyName,
          typ: 'JWT',
        },
      }
    );
  }
}

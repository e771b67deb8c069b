import type { AxiosInstance } from 'axios'
import type { AppLogger } from '../../lib/logger'
import { NetatmoApiError, toNetatmoApiError } from './errors'
import { TokenResponseSchema } from './schema'

export const TOKEN_ENDPOINT = '/oauth2/token'

// Tokens this close to expiry are treated as expired
const EXPIRY_SKEW_MS = 60_000

export interface SessionCredentials {
  clientId: string
  clientSecret: string
  username?: string
  password?: string
  refreshToken?: string
  scopes: string
}

export type TokenState = 'valid' | 'expired'

/**
 * OAuth2 token holder shared by every caller of the vendor API.
 *
 * All token requests go through one in-flight promise, so the poller and
 * concurrent HTTP handlers never refresh twice for the same stale token.
 */
export class TokenSession {
  private accessToken: string | null = null
  private refreshTokenValue: string | null
  private expiresAt = 0
  private pending: Promise<string> | null = null

  constructor(
    private http: AxiosInstance,
    private credentials: SessionCredentials,
    private logger: AppLogger,
    private now: () => number = Date.now
  ) {
    this.refreshTokenValue = credentials.refreshToken || null
  }

  get state(): TokenState {
    return this.accessToken !== null && this.now() < this.expiresAt - EXPIRY_SKEW_MS ? 'valid' : 'expired'
  }

  get expiresAtDate(): Date | null {
    return this.accessToken === null ? null : new Date(this.expiresAt)
  }

  /**
   * First token acquisition: refresh grant when a refresh token was
   * configured, password grant otherwise.
   */
  authenticate(): Promise<string> {
    return this.exclusive(() => this.acquire())
  }

  /**
   * Replace the access token. When `staleToken` is given and another caller
   * already swapped it for a valid one, that token is returned as is.
   */
  refresh(staleToken?: string): Promise<string> {
    if (
      staleToken !== undefined &&
      this.accessToken !== null &&
      this.accessToken !== staleToken &&
      this.state === 'valid'
    ) {
      return Promise.resolve(this.accessToken)
    }
    return this.exclusive(() => this.acquire())
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken !== null && this.state === 'valid') {
      return this.accessToken
    }
    return this.exclusive(() => this.acquire())
  }

  private exclusive(task: () => Promise<string>): Promise<string> {
    if (this.pending) return this.pending

    this.pending = task().finally(() => {
      this.pending = null
    })
    return this.pending
  }

  private async acquire(): Promise<string> {
    if (this.refreshTokenValue === null) {
      return this.passwordGrant()
    }

    try {
      return await this.requestToken({
        grant_type: 'refresh_token',
        refresh_token: this.refreshTokenValue,
      })
    } catch (err) {
      // A revoked refresh token can still be recovered with user credentials
      if (err instanceof NetatmoApiError && err.statusCode === 400 && this.hasPasswordCredentials()) {
        this.logger.warn({
          msg: `[NETATMO] Refresh token rejected (${err.message}), falling back to password grant`,
        })
        return this.passwordGrant()
      }
      throw err
    }
  }

  private hasPasswordCredentials(): boolean {
    return Boolean(this.credentials.username) && Boolean(this.credentials.password)
  }

  private passwordGrant(): Promise<string> {
    const { username, password } = this.credentials
    if (!username || !password) {
      return Promise.reject(new NetatmoApiError('No refresh token and no username/password configured', 401))
    }
    return this.requestToken({
      grant_type: 'password',
      username,
      password,
      scope: this.credentials.scopes,
    })
  }

  private async requestToken(grant: Record<string, string>): Promise<string> {
    const form = new URLSearchParams({
      ...grant,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    })

    let data: unknown
    try {
      const response = await this.http.post(TOKEN_ENDPOINT, form)
      data = response.data
    } catch (err) {
      const apiError = toNetatmoApiError(err, 'POST', TOKEN_ENDPOINT)
      this.logger.error({
        msg: `[NETATMO] Token request failed (${grant.grant_type}): ${apiError.message}`,
        statusCode: apiError.statusCode,
      })
      throw apiError
    }

    const parsed = TokenResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new NetatmoApiError('Token endpoint returned an unexpected body', 502)
    }

    this.accessToken = parsed.data.access_token
    this.refreshTokenValue = parsed.data.refresh_token
    this.expiresAt = this.now() + parsed.data.expires_in * 1000

    this.logger.success({
      msg: `✓ [NETATMO] Access token obtained (${grant.grant_type})`,
      expiresAt: new Date(this.expiresAt).toISOString(),
    })
    return parsed.data.access_token
  }
}

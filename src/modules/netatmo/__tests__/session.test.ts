import { beforeEach, describe, expect, it } from 'vitest'
import { FakeNetatmoApi } from '../../../testing/fakeNetatmoApi'
import { silentLogger } from '../../../testing/fixtures'
import { NetatmoApiError } from '../errors'
import { TokenSession, type SessionCredentials } from '../session'

const CREDENTIALS: SessionCredentials = {
    clientId: 'test-client',
    clientSecret: 'test-secret',
    refreshToken: 'test-refresh',
    scopes: 'read_thermostat write_thermostat',
}

describe('TokenSession', () => {
    let api: FakeNetatmoApi

    beforeEach(() => {
        api = new FakeNetatmoApi()
    })

    it('should use the refresh grant when a refresh token is configured', async () => {
        api.issueTokens()
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        const token = await session.authenticate()

        expect(token).toBe('access-1')
        expect(session.state).toBe('valid')
        expect(api.requests).toHaveLength(1)
        expect(api.requests[0].form).toEqual({
            grant_type: 'refresh_token',
            refresh_token: 'test-refresh',
            client_id: 'test-client',
            client_secret: 'test-secret',
        })
    })

    it('should send the rotated refresh token on the next refresh', async () => {
        api.issueTokens()
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        await session.authenticate()
        const token = await session.refresh()

        expect(token).toBe('access-2')
        expect(api.requests[1].form.refresh_token).toBe('refresh-1')
    })

    it('should use the password grant when only user credentials are configured', async () => {
        api.issueTokens()
        const session = new TokenSession(
            api.http,
            { ...CREDENTIALS, refreshToken: undefined, username: 'user@example.test', password: 'test-password' },
            silentLogger()
        )

        await session.authenticate()

        expect(api.requests[0].form).toEqual({
            grant_type: 'password',
            username: 'user@example.test',
            password: 'test-password',
            scope: 'read_thermostat write_thermostat',
            client_id: 'test-client',
            client_secret: 'test-secret',
        })
    })

    it('should fall back to the password grant when the refresh token is rejected', async () => {
        api.on('POST', '/oauth2/token', request =>
            request.form.grant_type === 'refresh_token'
                ? { status: 400, data: { error: 'invalid_grant' } }
                : { status: 200, data: { access_token: 'access-pw', refresh_token: 'refresh-pw', expires_in: 10800 } }
        )
        const session = new TokenSession(
            api.http,
            { ...CREDENTIALS, username: 'user@example.test', password: 'test-password' },
            silentLogger()
        )

        await expect(session.authenticate()).resolves.toBe('access-pw')
        expect(api.requests.map(request => request.form.grant_type)).toEqual(['refresh_token', 'password'])
    })

    it('should surface a rejected refresh token when there is nothing to fall back to', async () => {
        api.on('POST', '/oauth2/token', {
            status: 400,
            data: { error: 'invalid_grant', error_description: 'Refresh token revoked' },
        })
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        const error = await session.authenticate().catch((err: unknown) => err)

        expect(error).toBeInstanceOf(NetatmoApiError)
        expect(error).toMatchObject({ statusCode: 400, code: 'invalid_grant', message: 'Refresh token revoked' })
    })

    it('should refuse to authenticate without any grant', async () => {
        const session = new TokenSession(api.http, { ...CREDENTIALS, refreshToken: undefined }, silentLogger())

        await expect(session.authenticate()).rejects.toMatchObject({ statusCode: 401 })
        expect(api.requests).toHaveLength(0)
    })

    it('should reject a token body without an access token', async () => {
        api.on('POST', '/oauth2/token', { status: 200, data: { refresh_token: 'refresh-1', expires_in: 10800 } })
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        await expect(session.authenticate()).rejects.toMatchObject({ statusCode: 502 })
        expect(session.state).toBe('expired')
    })

    it('should share one token request between concurrent callers', async () => {
        api.issueTokens()
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        const tokens = await Promise.all([
            session.getAccessToken(),
            session.getAccessToken(),
            session.getAccessToken(),
        ])

        expect(tokens).toEqual(['access-1', 'access-1', 'access-1'])
        expect(api.tokensIssued).toBe(1)
    })

    it('should not refresh again for a token another caller already replaced', async () => {
        api.issueTokens()
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger())

        const stale = await session.getAccessToken()
        await session.refresh(stale)
        const token = await session.refresh(stale)

        expect(token).toBe('access-2')
        expect(api.tokensIssued).toBe(2)
    })

    it('should renew the token once it is about to expire', async () => {
        api.issueTokens(3600)
        let clock = 1_000_000
        const session = new TokenSession(api.http, CREDENTIALS, silentLogger(), () => clock)

        await session.getAccessToken()
        expect(session.expiresAtDate).toEqual(new Date(1_000_000 + 3_600_000))

        clock += 3_600_000 - 120_000
        await expect(session.getAccessToken()).resolves.toBe('access-1')

        clock += 90_000
        expect(session.state).toBe('expired')
        await expect(session.getAccessToken()).resolves.toBe('access-2')
    })
})

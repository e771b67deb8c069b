import type { AxiosInstance } from 'axios'
import type { z } from 'zod'
import type { AppLogger } from '../../lib/logger'
import { InvalidParameterError, NetatmoApiError, toNetatmoApiError } from './errors'
import {
  AckResponseSchema,
  HomeStatusResponseSchema,
  HomesDataResponseSchema,
  ThermostatModeSchema,
  THERMOSTAT_MODES,
  type AckResponse,
  type HomeStatusResponse,
  type HomesDataResponse,
} from './schema'
import type { TokenSession } from './session'

type HttpMethod = 'GET' | 'POST'

/**
 * The vendor operations the rest of the daemon depends on.
 */
export interface ThermostatApi {
  getHomesData(homeId?: string): Promise<HomesDataResponse>
  getHomeStatus(homeId: string): Promise<HomeStatusResponse>
  setThermostatMode(homeId: string, mode: string): Promise<AckResponse>
  setRoomTrueTemperature(roomId: string, temperature: number): Promise<AckResponse>
}

export class NetatmoClient implements ThermostatApi {
  constructor(
    private readonly http: AxiosInstance,
    private readonly session: TokenSession,
    private readonly homeId: string,
    private readonly logger: AppLogger
  ) {}

  authenticate(): Promise<string> {
    return this.session.authenticate()
  }

  refreshToken(): Promise<string> {
    return this.session.refresh()
  }

  getHomesData(homeId: string = this.homeId): Promise<HomesDataResponse> {
    return this.request('GET', '/api/homesdata', { home_id: homeId }, HomesDataResponseSchema)
  }

  getHomeStatus(homeId: string): Promise<HomeStatusResponse> {
    return this.request('GET', '/api/homestatus', { home_id: homeId }, HomeStatusResponseSchema)
  }

  async setThermostatMode(homeId: string, mode: string): Promise<AckResponse> {
    const parsedMode = ThermostatModeSchema.safeParse(mode)
    if (!parsedMode.success) {
      throw new InvalidParameterError(
        `Unsupported thermostat mode "${mode}", expected one of: ${THERMOSTAT_MODES.join(', ')}`
      )
    }
    if (homeId.trim() === '') {
      throw new InvalidParameterError('home_id must not be empty')
    }

    const ack = await this.request(
      'POST',
      '/api/setthermmode',
      { home_id: homeId, mode: parsedMode.data },
      AckResponseSchema
    )
    this.logger.info({ msg: `[NETATMO] Thermostat mode set to ${parsedMode.data}`, homeId })
    return ack
  }

  async setRoomTrueTemperature(roomId: string, temperature: number): Promise<AckResponse> {
    if (roomId.trim() === '') {
      throw new InvalidParameterError('room_id must not be empty')
    }
    if (!Number.isFinite(temperature)) {
      throw new InvalidParameterError(`corrected_temperature must be a finite number, got ${temperature}`)
    }

    const ack = await this.request(
      'POST',
      '/api/truetemperature',
      {
        home_id: this.homeId,
        room_id: roomId,
        corrected_temperature: String(temperature),
      },
      AckResponseSchema
    )
    this.logger.info({ msg: `[NETATMO] True temperature of room ${roomId} set to ${temperature}`, roomId })
    return ack
  }

  /**
   * Send one authenticated request. An authorization failure triggers one
   * token refresh and one retry; anything else is surfaced unchanged.
   */
  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    endpoint: string,
    params: Record<string, string>,
    schema: S
  ): Promise<z.infer<S>> {
    const token = await this.session.getAccessToken()

    try {
      return await this.send(method, endpoint, params, schema, token)
    } catch (err) {
      const apiError = toNetatmoApiError(err, method, endpoint)
      if (!apiError.isAuthFailure) throw apiError

      this.logger.warn({
        msg: `[NETATMO] ${method} ${endpoint} refused the access token (${apiError.statusCode}), refreshing`,
        code: apiError.code,
      })
      const refreshed = await this.session.refresh(token)

      try {
        return await this.send(method, endpoint, params, schema, refreshed)
      } catch (retryErr) {
        throw toNetatmoApiError(retryErr, method, endpoint)
      }
    }
  }

  private async send<S extends z.ZodTypeAny>(
    method: HttpMethod,
    endpoint: string,
    params: Record<string, string>,
    schema: S,
    token: string
  ): Promise<z.infer<S>> {
    const headers = { Authorization: `Bearer ${token}` }
    const response =
      method === 'GET'
        ? await this.http.get<unknown>(endpoint, { params, headers })
        : await this.http.post<unknown>(endpoint, new URLSearchParams(params), { headers })

    this.logger.debug({ msg: `[NETATMO] ${method} ${endpoint} - ${response.status}` })

    const parsed = schema.safeParse(response.data)
    if (!parsed.success) {
      throw new NetatmoApiError(`${method} ${endpoint} returned an unexpected body`, 502)
    }
    return parsed.data
  }
}

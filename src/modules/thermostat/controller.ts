import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { z } from 'zod'
import { InvalidParameterError, NetatmoApiError } from '../netatmo/errors'
import type { AckResponse, HomeStatusResponse, HomesDataResponse } from '../netatmo/schema'
import { RoomParamsSchema, SetModeQuerySchema, TrueTemperatureQuerySchema } from './schema'

type SetModeQuery = z.infer<typeof SetModeQuerySchema>
type RoomParams = z.infer<typeof RoomParamsSchema>
type TrueTemperatureQuery = z.infer<typeof TrueTemperatureQuerySchema>

export class ThermostatController {
  constructor(private fastify: FastifyInstance) {}

  setThermMode = async (
    req: FastifyRequest<{ Querystring: SetModeQuery }>,
    reply: FastifyReply
  ): Promise<AckResponse> => {
    const { mode } = req.query

    try {
      const ack = await this.fastify.netatmo.setThermostatMode(this.fastify.homeId, mode)
      this.fastify.log.info({ msg: `[HTTP] Thermostat mode set to ${mode}`, source: 'USER' })
      return ack
    } catch (err) {
      throw this.toHttpError(err)
    }
  }

  setTrueTemperature = async (
    req: FastifyRequest<{ Params: RoomParams; Querystring: TrueTemperatureQuery }>,
    reply: FastifyReply
  ): Promise<AckResponse> => {
    const { room_id: roomId } = req.params
    const { corrected_temperature: correctedTemperature } = req.query

    try {
      const ack = await this.fastify.netatmo.setRoomTrueTemperature(roomId, correctedTemperature)
      this.fastify.log.info({
        msg: `[HTTP] True temperature of room ${roomId} set to ${correctedTemperature}`,
        source: 'USER',
      })
      return ack
    } catch (err) {
      throw this.toHttpError(err)
    }
  }

  getHomeStatus = async (req: FastifyRequest, reply: FastifyReply): Promise<HomeStatusResponse> => {
    try {
      return await this.fastify.netatmo.getHomeStatus(this.fastify.homeId)
    } catch (err) {
      throw this.toHttpError(err)
    }
  }

  getHomesData = async (req: FastifyRequest, reply: FastifyReply): Promise<HomesDataResponse> => {
    try {
      return await this.fastify.netatmo.getHomesData(this.fastify.homeId)
    } catch (err) {
      throw this.toHttpError(err)
    }
  }

  /**
   * Vendor errors keep their status and message; bad input is a 400.
   */
  private toHttpError(err: unknown): Error {
    if (err instanceof InvalidParameterError) {
      return this.fastify.httpErrors.badRequest(err.message)
    }
    if (err instanceof NetatmoApiError) {
      this.fastify.log.warn({
        msg: `[HTTP] Vendor API error ${err.statusCode}: ${err.message}`,
        code: err.code,
      })
      return this.fastify.httpErrors.createError(err.statusCode, err.message)
    }
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    this.fastify.log.error(err)
    return this.fastify.httpErrors.internalServerError(errorMessage)
  }
}

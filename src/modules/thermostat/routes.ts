import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { ThermostatController } from './controller'
import {
  AckResponseSchema,
  HomeStatusResponseSchema,
  HomesDataResponseSchema,
  RoomParamsSchema,
  SetModeQuerySchema,
  TrueTemperatureQuerySchema,
} from './schema'

const thermostatRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new ThermostatController(fastify)

  // PUT /setthermode?mode=schedule|away|hg
  app.put(
    '/setthermode',
    {
      schema: {
        tags: ['Thermostat'],
        summary: 'Set the home thermostat mode',
        querystring: SetModeQuerySchema,
        response: {
          200: AckResponseSchema,
        },
      },
    },
    controller.setThermMode
  )

  // PUT /truetemperature/:room_id?corrected_temperature=21.5
  app.put(
    '/truetemperature/:room_id',
    {
      schema: {
        tags: ['Thermostat'],
        summary: 'Override the measured temperature of a room',
        params: RoomParamsSchema,
        querystring: TrueTemperatureQuerySchema,
        response: {
          200: AckResponseSchema,
        },
      },
    },
    controller.setTrueTemperature
  )

  // GET /homestatus - read-through, no caching
  app.get(
    '/homestatus',
    {
      schema: {
        tags: ['Thermostat'],
        summary: 'Current status of the configured home',
        response: {
          200: HomeStatusResponseSchema,
        },
      },
    },
    controller.getHomeStatus
  )

  // GET /homesdata - read-through, no caching
  app.get(
    '/homesdata',
    {
      schema: {
        tags: ['Thermostat'],
        summary: 'Rooms and modules of the configured home',
        response: {
          200: HomesDataResponseSchema,
        },
      },
    },
    controller.getHomesData
  )
}

export default thermostatRoutes

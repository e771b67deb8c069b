import fastify, { type FastifyBaseLogger } from 'fastify'
import cors from '@fastify/cors'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'

import type { AppLogger } from './lib/logger'
import type { HeatingWatchdog } from './modules/heating-monitor/watchdog'
import type { MqttPublisher } from './modules/mqtt/publisher'
import type { ThermostatApi } from './modules/netatmo/client'
import type { PollerService } from './modules/poller/pollerService'

// Plugins
import netatmoPlugin from './plugins/netatmo'
import mqttPlugin from './plugins/mqtt'
import pollerPlugin from './plugins/poller'

// Routes
import thermostatRoutes from './modules/thermostat/routes'
import systemRoutes from './modules/system/routes'

export interface AppDependencies {
  homeId: string
  logger: AppLogger
  netatmo: ThermostatApi
  publisher: MqttPublisher
  poller: PollerService
  watchdog: HeatingWatchdog
  /** Start polling once the server is ready */
  autoStart?: boolean
}

export async function buildApp(deps: AppDependencies) {
  const loggerInstance: FastifyBaseLogger = deps.logger

  const app = fastify({
    loggerInstance,
    disableRequestLogging: true, // Disable automatic request logging (too verbose)
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // CORS
  await app.register(cors, {
    origin: '*',
    methods: ['GET', 'PUT'],
  })

  // Swagger
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Netatmo Bridge API',
        description: 'Thermostat control and bridge status',
        version: '1.0.0',
      },
      servers: [],
    },
    transform: jsonSchemaTransform,
  })

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
  })

  // Core Plugins
  await app.register(netatmoPlugin, { client: deps.netatmo, homeId: deps.homeId })
  await app.register(mqttPlugin, { publisher: deps.publisher })
  await app.register(pollerPlugin, {
    poller: deps.poller,
    watchdog: deps.watchdog,
    autoStart: deps.autoStart ?? false,
  })

  // Routes
  await app.register(thermostatRoutes)
  await app.register(systemRoutes)

  return app
}

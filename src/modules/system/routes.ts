import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { SystemController } from './controller'
import { HealthResponseSchema, StatusResponseSchema } from './schema'

const systemRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new SystemController(fastify)

  // GET /health - process-up check, independent of vendor and broker state
  app.get(
    '/health',
    {
      schema: {
        tags: ['System'],
        summary: 'Liveness check',
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      return { status: 'ok' as const }
    }
  )

  // GET /status
  app.get(
    '/status',
    {
      schema: {
        tags: ['System'],
        summary: 'Poller, broker and watchdog state with the last snapshot',
        response: {
          200: StatusResponseSchema,
        },
      },
    },
    controller.getStatus
  )
}

export default systemRoutes

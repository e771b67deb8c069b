import fp from 'fastify-plugin'
import type { ThermostatApi } from '../modules/netatmo/client'

declare module 'fastify' {
  interface FastifyInstance {
    netatmo: ThermostatApi
    homeId: string
  }
}

export interface NetatmoPluginOptions {
  client: ThermostatApi
  homeId: string
}

export default fp<NetatmoPluginOptions>(
  async (fastify, opts) => {
    fastify.decorate('netatmo', opts.client)
    fastify.decorate('homeId', opts.homeId)
  },
  { name: 'netatmo' }
)

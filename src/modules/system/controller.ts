import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import type { StatusResponse } from '../../types/api'

export class SystemController {
  constructor(private fastify: FastifyInstance) {}

  getStatus = async (req: FastifyRequest, reply: FastifyReply) => {
    const { poller, publisher, watchdog } = this.fastify

    const response: StatusResponse = {
      uptimeSeconds: Math.round(process.uptime()),
      homeId: this.fastify.homeId,
      poller: poller.getStatus(),
      broker: publisher.status,
      watchdog: {
        enabled: watchdog.enabled,
        rooms: watchdog.getWatches(),
      },
      snapshot: poller.getLastSnapshot(),
    }
    return response
  }
}

import fp from 'fastify-plugin'
import type { HeatingWatchdog } from '../modules/heating-monitor/watchdog'
import type { PollerService } from '../modules/poller/pollerService'

declare module 'fastify' {
  interface FastifyInstance {
    poller: PollerService
    watchdog: HeatingWatchdog
  }
}

export interface PollerPluginOptions {
  poller: PollerService
  watchdog: HeatingWatchdog
  autoStart: boolean
}

export default fp<PollerPluginOptions>(
  async (fastify, opts) => {
    const { poller, watchdog } = opts

    fastify.decorate('poller', poller)
    fastify.decorate('watchdog', watchdog)

    if (opts.autoStart) {
      fastify.addHook('onReady', async () => {
        poller.start()
      })
    }

    // Graceful shutdown
    fastify.addHook('onClose', async () => {
      poller.stop()
    })
  },
  { name: 'poller', dependencies: ['netatmo', 'mqtt'] }
)

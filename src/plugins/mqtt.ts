import fp from 'fastify-plugin'
import type { MqttPublisher } from '../modules/mqtt/publisher'

declare module 'fastify' {
  interface FastifyInstance {
    publisher: MqttPublisher
  }
}

export interface MqttPluginOptions {
  publisher: MqttPublisher
}

export default fp<MqttPluginOptions>(
  async (fastify, opts) => {
    const { publisher } = opts

    fastify.log.info({ msg: `[MQTT] Connecting to ${publisher.brokerUrl}` })
    publisher.connect()

    fastify.decorate('publisher', publisher)

    fastify.addHook('onClose', async () => {
      await publisher.close()
    })
  },
  { name: 'mqtt' }
)

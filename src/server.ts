import axios from 'axios'
import { buildApp } from './app'
import { ConfigError, loadConfig, type AppConfig } from './config/env'
import { createLogger } from './lib/logger'
import { HeatingWatchdog } from './modules/heating-monitor/watchdog'
import { MqttPublisher } from './modules/mqtt/publisher'
import { NetatmoClient } from './modules/netatmo/client'
import { TokenSession } from './modules/netatmo/session'
import { PollerService } from './modules/poller/pollerService'

function readConfig(): AppConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`)
      for (const issue of err.issues) {
        process.stderr.write(`  - ${issue}\n`)
      }
      process.exit(1)
    }
    throw err
  }
}

async function start() {
  const config = readConfig()
  const logger = createLogger(config.logging)

  const http = axios.create({
    baseURL: config.api.baseUrl,
    timeout: config.api.timeoutMs,
  })
  const session = new TokenSession(http, config.credentials, logger)
  const netatmo = new NetatmoClient(http, session, config.home.homeId, logger)
  const publisher = new MqttPublisher(config.mqtt, logger)
  const watchdog = new HeatingWatchdog(
    netatmo,
    {
      enabled: config.monitor.enabled,
      homeId: config.home.homeId,
      checkRounds: config.monitor.checkRounds,
      tempDelta: config.monitor.tempDelta,
      valveDetection: config.monitor.valveDetection,
      valveTypes: config.monitor.valveTypes,
      valveActiveKeys: config.monitor.valveActiveKeys,
    },
    logger
  )
  const poller = new PollerService(
    netatmo,
    publisher,
    logger,
    { homeId: config.home.homeId, intervalSeconds: config.global.frequencySeconds },
    watchdog
  )

  // The first poll retries authentication, so a failure here is not fatal
  try {
    await netatmo.authenticate()
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    logger.error({ msg: `[NETATMO] Initial authentication failed: ${errorMessage}` })
  }

  const app = await buildApp({
    homeId: config.home.homeId,
    logger,
    netatmo,
    publisher,
    poller,
    watchdog,
    autoStart: true,
  })

  const shutdown = async (signal: string) => {
    app.log.info({ msg: `[SYSTEM] ${signal} received, shutting down` })
    try {
      await app.close()
      process.exit(0)
    } catch (err) {
      app.log.error(err)
      process.exit(1)
    }
  }
  process.once('SIGINT', signal => void shutdown(signal))
  process.once('SIGTERM', signal => void shutdown(signal))

  try {
    await app.listen({ port: config.http.port, host: config.http.host })

    logger.success({
      msg: `✓ [SYSTEM] Server listening on ${config.http.host}:${config.http.port}`,
      url: `http://${config.http.host}:${config.http.port}`,
    })
    logger.info(`[SYSTEM] Documentation at http://${config.http.host}:${config.http.port}/documentation`)
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void start()

import type { AppConfig } from '../config/env'
import { createLogger, type AppLogger } from '../lib/logger'
import type { HomeStatusResponse, HomesDataResponse } from '../modules/netatmo/schema'

export const HOME_ID = 'home-1'

export const testConfig: AppConfig = {
  credentials: {
    clientId: 'test-client',
    clientSecret: 'test-secret',
    refreshToken: 'test-refresh',
    scopes: 'read_thermostat write_thermostat',
  },
  home: { homeId: HOME_ID },
  mqtt: {
    topic: 'netatmo',
    broker: 'broker.test',
    port: 1883,
    keepalive: 60,
    tls: false,
  },
  global: { frequencySeconds: 300 },
  logging: { severity: 'silent' },
  http: { host: '127.0.0.1', port: 5000 },
  api: { baseUrl: 'https://netatmo.test', timeoutMs: 1000 },
  monitor: {
    enabled: false,
    checkRounds: 3,
    tempDelta: 0.5,
    valveDetection: true,
    valveTypes: ['NRV', 'VALVE'],
    valveActiveKeys: ['valve_position', 'valve', 'position', 'open', 'heating_power_request', 'valve_level'],
  },
}

export function silentLogger(): AppLogger {
  return createLogger({ severity: 'silent' })
}

export function homeStatus(
  rooms: HomeStatusResponse['body']['home']['rooms'] = [],
  modules: HomeStatusResponse['body']['home']['modules'] = []
): HomeStatusResponse {
  return {
    status: 'ok',
    time_server: 1767600000,
    body: { home: { id: HOME_ID, rooms, modules } },
  }
}

export function homesData(): HomesDataResponse {
  return {
    status: 'ok',
    body: {
      homes: [
        {
          id: HOME_ID,
          name: 'Maison',
          rooms: [
            { id: 'room-1', name: 'Salon', module_ids: ['valve-1'] },
            { id: 'room-2', name: 'Chambre', module_ids: [] },
          ],
          modules: [
            { id: 'relay-1', type: 'NAPlug', name: 'Relais' },
            { id: 'boiler-1', type: 'BNS', name: 'Chaudière' },
            { id: 'valve-1', type: 'NRV', name: 'Vanne salon', room_id: 'room-1' },
          ],
        },
      ],
    },
  }
}

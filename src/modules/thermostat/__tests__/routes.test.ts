import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { MqttClient } from 'mqtt'
import { buildApp } from '../../../app'
import { FakeMqttClient } from '../../../testing/fakeMqttClient'
import { HOME_ID, homeStatus, silentLogger, testConfig } from '../../../testing/fixtures'
import { createMockApi, type MockThermostatApi } from '../../../testing/mocks'
import { HeatingWatchdog } from '../../heating-monitor/watchdog'
import { MqttPublisher } from '../../mqtt/publisher'
import { InvalidParameterError, NetatmoApiError } from '../../netatmo/errors'
import { PollerService } from '../../poller/pollerService'

describe('REST API', () => {
    let api: MockThermostatApi
    let fake: FakeMqttClient
    let poller: PollerService
    let app: Awaited<ReturnType<typeof buildApp>>
    let closed: boolean

    beforeEach(async () => {
        const logger = silentLogger()
        api = createMockApi()
        api.getHomeStatus.mockResolvedValue(homeStatus([{ id: 'room-1', therm_measured_temperature: 19.5 }]))
        fake = new FakeMqttClient()
        const publisher = new MqttPublisher(testConfig.mqtt, logger, () => fake as unknown as MqttClient)
        const watchdog = new HeatingWatchdog(
            api,
            { enabled: false, homeId: HOME_ID, checkRounds: 3, tempDelta: 0.5 },
            logger
        )
        poller = new PollerService(api, publisher, logger, { homeId: HOME_ID, intervalSeconds: 300 }, watchdog)

        app = await buildApp({ homeId: HOME_ID, logger, netatmo: api, publisher, poller, watchdog })
        await app.ready()
        closed = false
    })

    afterEach(async () => {
        if (!closed) await app.close()
    })

    describe('GET /health', () => {
        it('should answer while the vendor and the broker are down', async () => {
            api.getHomeStatus.mockRejectedValue(new NetatmoApiError('Gateway timeout', 504))

            const response = await app.inject({ method: 'GET', url: '/health' })

            expect(response.statusCode).toBe(200)
            expect(response.json()).toEqual({ status: 'ok' })
        })
    })

    describe('PUT /setthermode', () => {
        it('should set the mode of the configured home', async () => {
            const response = await app.inject({ method: 'PUT', url: '/setthermode?mode=away' })

            expect(response.statusCode).toBe(200)
            expect(response.json()).toEqual({ status: 'ok' })
            expect(api.setThermostatMode).toHaveBeenCalledWith(HOME_ID, 'away')
        })

        it('should reject an unknown mode without calling the vendor', async () => {
            const response = await app.inject({ method: 'PUT', url: '/setthermode?mode=party' })

            expect(response.statusCode).toBe(400)
            expect(api.setThermostatMode).not.toHaveBeenCalled()
        })

        it('should reject a missing mode', async () => {
            const response = await app.inject({ method: 'PUT', url: '/setthermode' })

            expect(response.statusCode).toBe(400)
            expect(api.setThermostatMode).not.toHaveBeenCalled()
        })

        it('should forward the vendor status and message', async () => {
            api.setThermostatMode.mockRejectedValue(new NetatmoApiError('Operation forbidden', 403, 13))

            const response = await app.inject({ method: 'PUT', url: '/setthermode?mode=hg' })

            expect(response.statusCode).toBe(403)
            expect(response.json()).toMatchObject({ statusCode: 403, message: 'Operation forbidden' })
        })

        it('should answer 504 when the vendor timed out', async () => {
            api.setThermostatMode.mockRejectedValue(new NetatmoApiError('POST /api/setthermmode failed', 504))

            const response = await app.inject({ method: 'PUT', url: '/setthermode?mode=schedule' })

            expect(response.statusCode).toBe(504)
        })
    })

    describe('PUT /truetemperature/:room_id', () => {
        it('should forward the corrected temperature', async () => {
            const response = await app.inject({
                method: 'PUT',
                url: '/truetemperature/2255031728?corrected_temperature=21.5',
            })

            expect(response.statusCode).toBe(200)
            expect(api.setRoomTrueTemperature).toHaveBeenCalledWith('2255031728', 21.5)
        })

        it('should reject a temperature that is not a number', async () => {
            const response = await app.inject({
                method: 'PUT',
                url: '/truetemperature/2255031728?corrected_temperature=warm',
            })

            expect(response.statusCode).toBe(400)
            expect(api.setRoomTrueTemperature).not.toHaveBeenCalled()
        })

        it.each([
            ['an empty value', ''],
            ['a blank value', '%20'],
            ['a hexadecimal value', '0x1A'],
            ['an exponent', '2e1'],
            ['a trailing dot', '21.'],
        ])('should reject %s without writing to the thermostat', async (label, value) => {
            const response = await app.inject({
                method: 'PUT',
                url: `/truetemperature/123?corrected_temperature=${value}`,
            })

            expect(response.statusCode).toBe(400)
            expect(api.setRoomTrueTemperature).not.toHaveBeenCalled()
        })

        it('should reject a missing temperature', async () => {
            const response = await app.inject({ method: 'PUT', url: '/truetemperature/123' })

            expect(response.statusCode).toBe(400)
            expect(api.setRoomTrueTemperature).not.toHaveBeenCalled()
        })

        it('should accept negative and integer temperatures', async () => {
            await app.inject({ method: 'PUT', url: '/truetemperature/123?corrected_temperature=-3' })
            await app.inject({ method: 'PUT', url: '/truetemperature/123?corrected_temperature=%2019%20' })

            expect(api.setRoomTrueTemperature.mock.calls).toEqual([
                ['123', -3],
                ['123', 19],
            ])
        })

        it('should turn a rejected parameter into a 400', async () => {
            api.setRoomTrueTemperature.mockRejectedValue(new InvalidParameterError('room_id must not be empty'))

            const response = await app.inject({
                method: 'PUT',
                url: '/truetemperature/room-1?corrected_temperature=20',
            })

            expect(response.statusCode).toBe(400)
            expect(response.json()).toMatchObject({ message: 'room_id must not be empty' })
        })
    })

    describe('read-through routes', () => {
        it('should return the current home status', async () => {
            const response = await app.inject({ method: 'GET', url: '/homestatus' })

            expect(response.statusCode).toBe(200)
            expect(response.json().body.home.rooms).toEqual([{ id: 'room-1', therm_measured_temperature: 19.5 }])
            expect(api.getHomeStatus).toHaveBeenCalledWith(HOME_ID)
        })

        it('should return the homes data', async () => {
            const response = await app.inject({ method: 'GET', url: '/homesdata' })

            expect(response.statusCode).toBe(200)
            expect(response.json().body.homes[0].name).toBe('Maison')
        })
    })

    describe('GET /status', () => {
        it('should report poller, broker and snapshot state', async () => {
            fake.simulateConnect()
            await poller.runOnce()

            const response = await app.inject({ method: 'GET', url: '/status' })

            expect(response.statusCode).toBe(200)
            const body = response.json()
            expect(body.homeId).toBe(HOME_ID)
            expect(body.poller).toMatchObject({ running: false, cycles: 1, failures: 0, intervalSeconds: 300 })
            expect(body.broker).toMatchObject({
                connected: true,
                brokerUrl: 'mqtt://broker.test:1883',
                published: 2,
            })
            expect(body.watchdog).toEqual({ enabled: false, rooms: [] })
            expect(body.snapshot.rooms[0]).toMatchObject({ id: 'room-1', name: 'Salon', measuredTemperature: 19.5 })
        })

        it('should report a missing snapshot before the first cycle', async () => {
            const response = await app.inject({ method: 'GET', url: '/status' })

            expect(response.json().snapshot).toBeNull()
        })
    })

    describe('GET /documentation/json', () => {
        it('should describe the thermostat routes', async () => {
            const response = await app.inject({ method: 'GET', url: '/documentation/json' })

            expect(response.statusCode).toBe(200)
            expect(Object.keys(response.json().paths)).toEqual(
                expect.arrayContaining(['/setthermode', '/truetemperature/{room_id}', '/health', '/status'])
            )
        })
    })

    it('should close the broker connection with the server', async () => {
        await app.close()
        closed = true

        expect(fake.ended).toBe(true)
    })
})

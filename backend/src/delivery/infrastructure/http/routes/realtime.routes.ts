/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { getLatestReadingsController } from '../controllers/get-latest-readings.controller.js'
import { getDeviceReadingController } from '../controllers/get-device-reading.controller.js'

const latestReadingsRoutes = Router()

latestReadingsRoutes.get('/api/realtime/latest', getLatestReadingsController)
latestReadingsRoutes.get('/api/realtime/latest/:deviceId', getDeviceReadingController)

export { latestReadingsRoutes }

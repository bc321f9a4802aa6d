/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { getWsStatusController } from '../controllers/get-ws-status.controller.js'

const wsStatusRoutes = Router()

wsStatusRoutes.get('/ws/status', getWsStatusController)

export { wsStatusRoutes }

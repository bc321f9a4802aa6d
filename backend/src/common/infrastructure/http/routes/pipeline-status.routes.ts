/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { getPipelineStatusController } from '../controllers/get-pipeline-status.controller.js'

const pipelineStatusRoutes = Router()

pipelineStatusRoutes.get('/api/status', getPipelineStatusController)

export { pipelineStatusRoutes }

/* eslint-disable prettier/prettier */
import { Request, Response } from 'express'
import { container } from 'tsyringe'
import { z } from 'zod'
import { dataValidation } from '../../../../common/infrastructure/validation/zod/index.js'
import { GetDeviceReadingUseCase } from '../../../app/usecases/get-device-reading.usecase.js'

const paramsSchema = z.object({
  deviceId: z.string().trim().min(1).max(128),
})

/**
 * `GET /api/realtime/latest/:deviceId`
 * 404 (NotFoundError) until the device has produced a Reading.
 */
export async function getDeviceReadingController(
  request: Request,
  response: Response,
): Promise<Response> {
  const { deviceId } = dataValidation(paramsSchema, request.params)

  const useCase = container.resolve<GetDeviceReadingUseCase>('GetDeviceReadingUseCase')
  const data = await useCase.execute({ deviceId })

  return response.status(200).json({ success: true, data })
}

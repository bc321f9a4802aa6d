/* eslint-disable prettier/prettier */
import { Request, Response } from 'express'
import { container } from 'tsyringe'
import { GetLatestReadingsUseCase } from '../../../app/usecases/get-latest-readings.usecase.js'

export async function getLatestReadingsController(
  _request: Request,
  response: Response,
): Promise<Response> {
  const useCase = container.resolve<GetLatestReadingsUseCase>('GetLatestReadingsUseCase')
  const data = await useCase.execute()

  return response.status(200).json({ success: true, data })
}

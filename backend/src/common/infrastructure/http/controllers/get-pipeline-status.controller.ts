/* eslint-disable prettier/prettier */
import { Request, Response } from 'express'
import { container } from 'tsyringe'
import { GetPipelineStatusUseCase } from '../../../app/usecases/get-pipeline-status.usecase.js'

export async function getPipelineStatusController(
  _request: Request,
  response: Response,
): Promise<Response> {
  const useCase = container.resolve<GetPipelineStatusUseCase>('GetPipelineStatusUseCase')
  const data = await useCase.execute()

  return response.status(200).json({ success: true, data })
}

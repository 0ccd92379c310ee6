import { type ArgumentsHost, Catch, type ExceptionFilter, HttpStatus, Logger } from '@nestjs/common'
import type { Response } from 'express'
import { VolumeInputError } from './volume.errors'

@Catch(VolumeInputError)
export class VolumeInputErrorFilter implements ExceptionFilter<VolumeInputError> {
  private readonly logger = new Logger(VolumeInputErrorFilter.name)

  catch(exception: VolumeInputError, host: ArgumentsHost) {
    this.logger.debug(`${exception.code}: ${exception.message}`)
    host
      .switchToHttp()
      .getResponse<Response>()
      .status(HttpStatus.BAD_REQUEST)
      .json({
        statusCode: HttpStatus.BAD_REQUEST,
        error: exception.code,
        message: exception.message,
      })
  }
}

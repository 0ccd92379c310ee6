import { Module } from '@nestjs/common'
import { APP_FILTER } from '@nestjs/core'
import { AuthModule } from '../auth/auth.module'
import { VolumeInputErrorFilter } from './volume-input-error.filter'
import { VolumeLandmarkTable, volumeLandmarks } from './volume-landmarks'
import { VolumeController } from './volume.controller'
import { VolumeService } from './volume.service'

@Module({
  imports: [AuthModule],
  controllers: [VolumeController],
  providers: [
    { provide: VolumeLandmarkTable, useValue: volumeLandmarks },
    { provide: APP_FILTER, useClass: VolumeInputErrorFilter },
    VolumeService,
  ],
  exports: [VolumeLandmarkTable, VolumeService],
})
export class VolumeModule {}

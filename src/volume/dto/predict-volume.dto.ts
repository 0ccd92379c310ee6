import { IsBoolean, IsInt, IsOptional, IsString } from 'class-validator'

// Domain values (set count range, muscle group, level) are checked by the volume rules,
// so that they surface as the rules' own error codes.
export class PredictVolumeDto {
  @IsInt()
  currentSets!: number

  @IsString()
  trainingLevel!: string

  @IsBoolean()
  progress!: boolean

  @IsBoolean()
  recovered!: boolean

  @IsOptional()
  @IsString()
  muscleGroup?: string
}

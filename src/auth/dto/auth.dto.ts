import { IsEmail, IsNotEmpty, IsString, Length, MinLength } from 'class-validator'

export class RegisterDto {
  @IsEmail()
  email!: string

  @IsString()
  @MinLength(8)
  password!: string
}

export class LoginDto {
  @IsEmail()
  email!: string

  @IsString()
  @IsNotEmpty()
  password!: string
}

export class CreateApiKeyDto {
  @IsString()
  @Length(1, 255)
  name!: string
}

export class ApiKeyResponseDto {
  id!: number
  key!: string
  name!: string
  createdAt!: Date
  lastUsedAt!: Date | null
}

import { IsEmail, IsNotEmpty, IsString, MaxLength, MinLength } from 'class-validator';

/** users.email and users.full_name are varchar(255) */
const MAX_COLUMN_LENGTH = 255;

/** POST /auth/login. Only the shape is checked; AuthService checks the password. */
export class LoginDto {
  @IsEmail({}, { message: 'email must be a valid address' })
  @MaxLength(MAX_COLUMN_LENGTH)
  email!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

/** POST /auth/register. No complexity rules beyond the length bounds. */
export class RegisterDto {
  @IsEmail({}, { message: 'email must be a valid address' })
  @MaxLength(MAX_COLUMN_LENGTH)
  email!: string;

  @IsString()
  @MinLength(8)
  @MaxLength(128)
  password!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_COLUMN_LENGTH)
  fullName!: string;
}

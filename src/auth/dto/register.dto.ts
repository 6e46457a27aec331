import { IsEmail, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class RegisterDto {
  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  tenant_name?: string; // Create a tenant owned by the new user

  @IsOptional()
  @IsString()
  @MaxLength(200)
  full_name?: string;
}

import { PartialType } from '@nestjs/swagger';
import { IsBoolean, IsEmail, IsOptional, IsString, Length, Matches } from 'class-validator';

export class RegisterDto {
  @IsString() @Length(3, 150) @Matches(/^[\w.@+-]+$/, { message: 'username sólo admite letras, dígitos y @.+-_' })
  username!: string;
  @IsOptional() @IsEmail() email?: string;
  @IsString() @Length(8, 128) password!: string;
  // sólo se respeta con ALLOW_REGISTER_ADMIN=true
  @IsOptional() @IsBoolean() staff?: boolean;
}

export class LoginDto {
  @IsString() username!: string;
  @IsString() password!: string;
}

export class UpdateProfileDto {
  @IsOptional() @IsEmail() email?: string;
  @IsOptional() @IsString() @Length(8, 128) password?: string;
}

export class RefreshDto {
  @IsString() refreshToken!: string;
}

// Admin: la contraseña llega en claro y se guarda como hash
export class AdminCreateUserDto {
  @IsString() @Length(3, 150) @Matches(/^[\w.@+-]+$/, { message: 'username sólo admite letras, dígitos y @.+-_' })
  username!: string;
  @IsOptional() @IsEmail() email?: string;
  @IsString() @Length(8, 128) password!: string;
  @IsOptional() @IsBoolean() isStaff?: boolean;
  @IsOptional() @IsBoolean() isSuperuser?: boolean;
  @IsOptional() @IsBoolean() isActive?: boolean;
}

export class AdminUpdateUserDto extends PartialType(AdminCreateUserDto) {}

import { IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PasswordResetDto {
  @ApiProperty({ description: 'Value of ADMIN_RESET_KEY' })
  @IsString()
  reset_key!: string;

  @ApiProperty()
  @IsString()
  new_password!: string;

  @ApiProperty()
  @IsString()
  confirm_password!: string;
}

import { ApiProperty } from '@nestjs/swagger';

export class HealthResponseDto {
  @ApiProperty({ description: 'HTTP status mirrored in the body', example: 200 })
  status!: number;

  @ApiProperty({ description: 'Health message', example: 'Healthy' })
  message!: string;
}

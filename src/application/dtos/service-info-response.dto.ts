import { ApiProperty } from '@nestjs/swagger';

export class ServiceInfoResponseDto {
  @ApiProperty({ example: 'Recommendations REST API Service' })
  name!: string;

  @ApiProperty({ example: '1.0' })
  version!: string;

  @ApiProperty({ description: 'Absolute URL of the collection', example: 'http://localhost:8080/recommendations' })
  paths!: string;
}

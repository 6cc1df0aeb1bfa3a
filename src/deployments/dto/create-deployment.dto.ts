import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { Liveness } from '../../targets/target.types';

export class TargetSelectorDto {
  @ApiProperty({
    description: 'Every label must be present on the target with an equal value',
    example: { fleet: 'web', env: 'production' },
  })
  labels!: Record<string, string>;

  @ApiPropertyOptional({
    enum: ['alive', 'unreachable', 'unknown'],
    description: "Required liveness (default: 'alive')",
  })
  liveness?: Liveness;
}

export class CreateDeploymentDto {
  @ApiProperty({ type: TargetSelectorDto })
  selector!: TargetSelectorDto;

  @ApiProperty({ example: 'registry.example.com/shop/api:1.4.2' })
  imageRef!: string;
}

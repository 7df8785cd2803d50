import { ApiProperty } from '@nestjs/swagger';

export class HealthResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: 'ok';

  @ApiProperty({ example: '2026-01-02T00:00:00.000Z' })
  time!: string;
}

export class ReadinessCheckDto {
  @ApiProperty({ example: true })
  ok!: boolean;

  @ApiProperty({ example: 'ENOENT: no such file or directory', required: false })
  error?: string;
}

export class ReadinessResponseDto {
  @ApiProperty({ enum: ['ready', 'not_ready'], example: 'ready' })
  status!: 'ready' | 'not_ready';

  @ApiProperty({ example: '2026-01-02T00:00:00.000Z' })
  time!: string;

  @ApiProperty({
    example: {
      aria2: { ok: true },
      downloadDir: { ok: true },
      extractDir: { ok: true },
      endedDir: { ok: true },
    },
  })
  checks!: Record<string, ReadinessCheckDto>;

  @ApiProperty({ example: { sonarr: 'online', radarr: 'not_configured' } })
  integrations!: Record<string, string>;
}

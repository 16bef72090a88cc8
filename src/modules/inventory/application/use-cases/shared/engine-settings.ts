import type { ConfigService } from '@nestjs/config';
import type { EngineSettings } from '../../../domain/replenishment';

export const DEFAULT_CENTRAL_WAREHOUSE_MARKER = 'bodega';

export function resolveEngineSettings(configService: ConfigService): EngineSettings {
  return {
    centralWarehouseMarker:
      configService.get<string>('CENTRAL_WAREHOUSE_MARKER') ?? DEFAULT_CENTRAL_WAREHOUSE_MARKER,
  };
}

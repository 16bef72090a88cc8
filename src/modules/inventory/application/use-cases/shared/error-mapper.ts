import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import {
  INVALID_WINDOW_MESSAGE,
  INVENTORY_SOURCE_UNAVAILABLE_MESSAGE,
} from '../../../../../common/constants/error-messages.constants';
import { InvalidWindowError, InventorySourceError } from '../../../domain/errors';
import type { InventoryRunOutcome } from '../../ports/inventory-metrics.port';

export function classifyRunError(error: unknown): InventoryRunOutcome {
  if (error instanceof InvalidWindowError) {
    return 'invalid';
  }
  if (error instanceof InventorySourceError) {
    return 'source_error';
  }

  return 'error';
}

/** Domain errors become HTTP exceptions; anything else propagates untouched. */
export function mapEngineError(error: unknown): unknown {
  if (error instanceof InvalidWindowError) {
    return new BadRequestException(INVALID_WINDOW_MESSAGE);
  }

  if (error instanceof InventorySourceError) {
    return new ServiceUnavailableException(INVENTORY_SOURCE_UNAVAILABLE_MESSAGE);
  }

  return error;
}

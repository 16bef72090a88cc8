/**
 * User-facing error messages returned by the HTTP layer.
 */

export const BACKEND_ERROR_MESSAGE =
  'Tuvimos un inconveniente calculando el inventario. Intenta nuevamente en unos minutos.';

export const INVALID_PAYLOAD_MESSAGE = 'Payload invalido.';

export const INVENTORY_SOURCE_UNAVAILABLE_MESSAGE =
  'No se pudo leer la base de inventario. Intenta nuevamente en unos minutos.';

export const INVALID_WINDOW_MESSAGE = 'expansionWindowDays debe ser >= replenishmentWindowDays.';

export const NOTHING_TO_EXPORT_MESSAGE = 'No hay filas para exportar.';

export const INVALID_BRAND_MESSAGE = 'Marca invalida.';

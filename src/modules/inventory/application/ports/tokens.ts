export const PG_POOL = Symbol('PG_POOL');
export const INVENTORY_SOURCE_PORT = Symbol('INVENTORY_SOURCE_PORT');
export const INVENTORY_METRICS_PORT = Symbol('INVENTORY_METRICS_PORT');
export const SPREADSHEET_EXPORTER_PORT = Symbol('SPREADSHEET_EXPORTER_PORT');

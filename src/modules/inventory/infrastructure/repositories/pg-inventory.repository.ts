import { Inject, Injectable } from '@nestjs/common';
import { Pool, type PoolClient } from 'pg';
import { redactConnectionString } from '../../../../common/utils/secret-redaction';
import { createLogger } from '../../../../common/utils/logger';
import type { InventorySourcePort } from '../../application/ports/inventory-source.port';
import { PG_POOL } from '../../application/ports/tokens';
import { InventorySourceError } from '../../domain/errors';
import type { InventorySnapshot } from '../../domain/inventory-snapshot';

/**
 * Reads every table the engine needs inside one read-only REPEATABLE READ
 * transaction, so all pipelines of a run see the same snapshot.
 * Quantities and flags are selected as text and parsed by the domain.
 */
@Injectable()
export class PgInventoryRepository implements InventorySourcePort {
  private readonly logger = createLogger(PgInventoryRepository.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async loadSnapshot(): Promise<InventorySnapshot> {
    const startedAt = Date.now();
    const client = await this.connect();

    try {
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');

      const policies = await client.query<{ tipo: string | null; cantidad: string | null }>(
        `SELECT tipo, cantidad::text AS cantidad
         FROM stock_minimo_config`,
      );
      const fixedReferences = await client.query<{ cod_barras: string }>(
        `SELECT cod_barras::text AS cod_barras
         FROM referencias_fijas
         WHERE cod_barras IS NOT NULL`,
      );
      const multiBrands = await client.query<{ marca: string }>(
        `SELECT marca
         FROM marcas_multimarca
         WHERE marca IS NOT NULL`,
      );
      const excluded = await client.query<{ cod_barras: string }>(
        `SELECT cod_barras::text AS cod_barras
         FROM codigos_excluidos
         WHERE cod_barras IS NOT NULL`,
      );
      const stores = await client.query<{
        raw_name: string | null;
        clean_name: string | null;
        region: string | null;
        fija: string | null;
        tipo_tienda: string | null;
        activa: string | null;
      }>(
        `SELECT raw_name, clean_name, region, fija::text AS fija, tipo_tienda, activa::text AS activa
         FROM config_tiendas
         ORDER BY raw_name`,
      );
      const sales = await client.query<{
        d_almacen: string | null;
        c_barra: string | null;
        d_marca: string | null;
        f_sistema: string | null;
        cn_venta: string | null;
      }>(
        `SELECT d_almacen, c_barra::text AS c_barra, d_marca, f_sistema::text AS f_sistema,
                cn_venta::text AS cn_venta
         FROM ventas_historico_raw`,
      );
      const stock = await client.query<{
        d_almacen: string | null;
        c_barra: string | null;
        d_marca: string | null;
        d_color_proveedor: string | null;
        saldo_disponible: string | null;
      }>(
        `SELECT d_almacen, c_barra::text AS c_barra, d_marca, d_color_proveedor,
                saldo_disponible::text AS saldo_disponible
         FROM ventas_saldos_raw`,
      );
      const warehouse = await client.query<{
        c_barra: string | null;
        saldo_disponibles: string | null;
      }>(
        `SELECT c_barra::text AS c_barra, saldo_disponibles::text AS saldo_disponibles
         FROM inventario_bodega_raw`,
      );

      await client.query('COMMIT');

      this.logger.db('inventory_snapshot_loaded', {
        event: 'inventory_snapshot_loaded',
        sales_rows: sales.rowCount ?? sales.rows.length,
        stock_rows: stock.rowCount ?? stock.rows.length,
        warehouse_rows: warehouse.rowCount ?? warehouse.rows.length,
        stores: stores.rows.length,
        duration: Date.now() - startedAt,
      });

      return {
        policies: policies.rows.map((row) => ({ category: row.tipo, quantity: row.cantidad })),
        fixedReferenceCodes: fixedReferences.rows.map((row) => row.cod_barras),
        multiBrandNames: multiBrands.rows.map((row) => row.marca),
        excludedCodes: excluded.rows.map((row) => row.cod_barras),
        stores: stores.rows.map((row) => ({
          rawName: row.raw_name,
          cleanName: row.clean_name,
          region: row.region,
          fixed: row.fija,
          storeType: row.tipo_tienda,
          active: row.activa,
        })),
        sales: sales.rows.map((row) => ({
          storeRaw: row.d_almacen,
          itemCode: row.c_barra,
          brand: row.d_marca,
          soldOn: row.f_sistema,
          quantity: row.cn_venta,
        })),
        stock: stock.rows.map((row) => ({
          storeRaw: row.d_almacen,
          itemCode: row.c_barra,
          brand: row.d_marca,
          color: row.d_color_proveedor,
          available: row.saldo_disponible,
        })),
        warehouse: warehouse.rows.map((row) => ({
          itemCode: row.c_barra,
          available: row.saldo_disponibles,
        })),
      };
    } catch (error: unknown) {
      await this.rollback(client);
      throw new InventorySourceError('Inventory snapshot query failed', 'query', error);
    } finally {
      client.release();
    }
  }

  private async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error: unknown) {
      this.logger.error(
        'inventory_db_connect_failed',
        error instanceof Error ? error : undefined,
        { event: 'inventory_db_connect_failed', detail: redactConnectionString(String(error)) },
      );
      throw new InventorySourceError('Inventory database unavailable', 'connect', error);
    }
  }

  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error: unknown) {
      this.logger.warn('inventory_snapshot_rollback_failed', {
        event: 'inventory_snapshot_rollback_failed',
        error_message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

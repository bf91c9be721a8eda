import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_positions', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    position_key: { type: 'text', notNull: true },
    product_id: { type: 'text', notNull: true },
    variant_id: { type: 'text' },
    warehouse_id: { type: 'text', notNull: true },
    location_id: { type: 'text' },
    batch_id: { type: 'text' },
    on_hand: { type: 'numeric(18,3)', notNull: true, default: 0 },
    available: { type: 'numeric(18,3)', notNull: true, default: 0 },
    reserved: { type: 'numeric(18,3)', notNull: true, default: 0 },
    allocated: { type: 'numeric(18,3)', notNull: true, default: 0 },
    picked: { type: 'numeric(18,3)', notNull: true, default: 0 },
    shipped: { type: 'numeric(18,3)', notNull: true, default: 0 },
    incoming: { type: 'numeric(18,3)', notNull: true, default: 0 },
    in_transit: { type: 'numeric(18,3)', notNull: true, default: 0 },
    unit_cost: { type: 'numeric(18,4)', notNull: true, default: 0 },
    average_cost: { type: 'numeric(18,2)', notNull: true, default: 0 },
    standard_cost: { type: 'numeric(18,4)', notNull: true, default: 0 },
    total_value: { type: 'numeric(20,2)', notNull: true, default: 0 },
    valuation_method: { type: 'text', notNull: true, default: 'FIFO' },
    quality_grade: { type: 'text' },
    expiry_date: { type: 'timestamptz' },
    location_distance: { type: 'numeric(12,3)' },
    first_received_at: { type: 'timestamptz' },
    last_received_at: { type: 'timestamptz' },
    last_movement_at: { type: 'timestamptz' },
    last_movement_seq: { type: 'bigint', notNull: true, default: 0 },
    last_layer_seq: { type: 'bigint', notNull: true, default: 0 },
    is_active: { type: 'boolean', notNull: true, default: true },
    is_deleted: { type: 'boolean', notNull: true, default: false },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_positions', 'uq_stock_positions_tenant_key', 'UNIQUE (tenant_id, position_key)');
  pgm.addConstraint(
    'stock_positions',
    'chk_stock_positions_valuation_method',
    "CHECK (valuation_method IN ('FIFO', 'LIFO'))"
  );
  pgm.addConstraint(
    'stock_positions',
    'chk_stock_positions_buckets_non_negative',
    'CHECK (on_hand >= 0 AND available >= 0 AND reserved >= 0 AND allocated >= 0 AND picked >= 0 AND shipped >= 0)'
  );
  pgm.createIndex('stock_positions', ['tenant_id', 'product_id', 'warehouse_id'], {
    name: 'idx_stock_positions_product_warehouse'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_positions');
}

import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('valuation_layers', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    position_id: { type: 'uuid', notNull: true, references: 'stock_positions' },
    sequence: { type: 'bigint', notNull: true },
    method: { type: 'text', notNull: true },
    received_at: { type: 'timestamptz', notNull: true },
    quantity_received: { type: 'numeric(18,3)', notNull: true },
    quantity_consumed: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_remaining: { type: 'numeric(18,3)', notNull: true },
    unit_cost: { type: 'numeric(18,4)', notNull: true },
    landed_cost_per_unit: { type: 'numeric(18,4)', notNull: true, default: 0 },
    total_landed_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    freight_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    duty_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    handling_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    other_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    is_fully_consumed: { type: 'boolean', notNull: true, default: false },
    fully_consumed_at: { type: 'timestamptz' },
    // Movement ids are generated before the movement row is written in the same transaction.
    movement_id: { type: 'uuid', references: 'stock_movements', deferrable: true, deferred: true },
    document_type: { type: 'text' },
    document_id: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('valuation_layers', 'uq_valuation_layers_position_sequence', 'UNIQUE (tenant_id, position_id, sequence)');
  pgm.addConstraint(
    'valuation_layers',
    'chk_valuation_layers_quantities',
    'CHECK (quantity_remaining >= 0 AND quantity_consumed >= 0 AND quantity_remaining <= quantity_received)'
  );
  pgm.createIndex('valuation_layers', ['tenant_id', 'position_id', 'received_at'], {
    name: 'idx_valuation_layers_open',
    where: 'quantity_remaining > 0'
  });
  pgm.createIndex('valuation_layers', ['tenant_id', 'document_type', 'document_id'], {
    name: 'idx_valuation_layers_document',
    where: 'document_id IS NOT NULL'
  });

  pgm.createTable('valuation_layer_consumptions', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    layer_id: { type: 'uuid', notNull: true, references: 'valuation_layers' },
    movement_id: {
      type: 'uuid',
      notNull: true,
      references: 'stock_movements',
      deferrable: true,
      deferred: true
    },
    position_id: { type: 'uuid', notNull: true, references: 'stock_positions' },
    quantity: { type: 'numeric(18,3)', notNull: true },
    unit_cost: { type: 'numeric(18,4)', notNull: true },
    total_cost: { type: 'numeric(20,2)', notNull: true },
    consumed_at: { type: 'timestamptz', notNull: true }
  });

  pgm.addConstraint('valuation_layer_consumptions', 'chk_layer_consumptions_qty_positive', 'CHECK (quantity > 0)');
  pgm.createIndex('valuation_layer_consumptions', ['tenant_id', 'movement_id'], {
    name: 'idx_layer_consumptions_movement'
  });
  pgm.createIndex('valuation_layer_consumptions', ['tenant_id', 'layer_id'], {
    name: 'idx_layer_consumptions_layer'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('valuation_layer_consumptions');
  pgm.dropTable('valuation_layers');
}
